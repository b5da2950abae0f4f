/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-10 strings of base units; times as unix seconds.
 */

import { z } from "zod";
import { isAddress, normalizeAddress } from "@ubistream/types";
import type {
  Address,
  Amount,
  DelegationKind,
  DelegationId,
  SettlementReason,
  UnixSeconds,
} from "@ubistream/types";
import type {
  CancellationResult,
  CreateDelegationParams,
  DelegationRecord,
  DelegationState,
  WithdrawalResult,
} from "@ubistream/delegation";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine(isAddress, { message: "Expected a 0x-prefixed 20-byte hex address" })
  .transform(normalizeAddress);

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a base-10 integer string of base units")
  .transform((value): Amount => BigInt(value));

export const UnixSecondsSchema = z.number().int().nonnegative();

export const DelegationIdSchema = z.coerce.number().int().positive();

// =============================================================================
// Account DTOs
// =============================================================================

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const BurnSchema = z.object({
  amount: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

// =============================================================================
// Delegation DTOs
// =============================================================================

const StreamDelegationSchema = z.object({
  kind: z.literal("stream"),
  recipient: AddressSchema,
  ratePerSecond: AmountSchema,
  startTime: UnixSecondsSchema.optional(),
  stopTime: UnixSecondsSchema,
  cancellable: z.boolean().optional(),
});

const FlowDelegationSchema = z.object({
  kind: z.literal("flow"),
  recipient: AddressSchema,
  ratePerSecond: AmountSchema,
  startTime: UnixSecondsSchema.optional(),
});

export const CreateDelegationSchema = z.discriminatedUnion("kind", [
  StreamDelegationSchema,
  FlowDelegationSchema,
]);

export type CreateDelegationDto = z.infer<typeof CreateDelegationSchema>;

export const WithdrawSchema = z.object({
  ids: z.array(DelegationIdSchema).min(1).max(100),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const WithdrawAmountSchema = z.object({
  amount: AmountSchema,
});

export type WithdrawAmountDto = z.infer<typeof WithdrawAmountSchema>;

export const BalanceQuerySchema = z.object({
  asOf: z.coerce.number().int().nonnegative().optional(),
});

export type BalanceQuery = z.infer<typeof BalanceQuerySchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const MaxDelegationsSchema = z.object({
  value: z.number().int().positive(),
});

export type MaxDelegationsDto = z.infer<typeof MaxDelegationsSchema>;

export const RegistryEntrySchema = z.object({
  verified: z.boolean(),
});

export type RegistryEntryDto = z.infer<typeof RegistryEntrySchema>;

export const GovernorSchema = z.object({
  address: AddressSchema,
});

export type GovernorDto = z.infer<typeof GovernorSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  from: z.coerce.number().int().min(1).default(1),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Request Mapping
// =============================================================================

export function toCreateDelegationParams(
  dto: CreateDelegationDto,
): CreateDelegationParams {
  const base = {
    recipient: dto.recipient,
    ratePerSecond: dto.ratePerSecond,
    ...(dto.startTime !== undefined ? { startTime: dto.startTime } : {}),
  };
  if (dto.kind === "flow") {
    return { kind: "flow", ...base };
  }
  return {
    kind: "stream",
    ...base,
    stopTime: dto.stopTime,
    ...(dto.cancellable !== undefined ? { cancellable: dto.cancellable } : {}),
  };
}

// =============================================================================
// Responses
// =============================================================================

export interface DelegationView {
  readonly id: DelegationId;
  readonly kind: DelegationKind;
  readonly sender: Address;
  readonly recipient: Address;
  readonly ratePerSecond: string;
  readonly startTime: UnixSeconds;
  readonly stopTime: UnixSeconds | null;
  readonly cancellable: boolean;
  readonly createdAt: UnixSeconds;
  readonly settledAccrued: string;
  readonly withdrawn: string;
}

export type DelegationStateView =
  | { readonly status: "active"; readonly delegation: DelegationView }
  | {
      readonly status: "settled";
      readonly id: DelegationId;
      readonly reason: SettlementReason;
      readonly settledAt: UnixSeconds;
    }
  | { readonly status: "unknown"; readonly id: DelegationId };

export function toDelegationView(record: DelegationRecord): DelegationView {
  return {
    id: record.id,
    kind: record.kind,
    sender: record.sender,
    recipient: record.recipient,
    ratePerSecond: record.ratePerSecond.toString(),
    startTime: record.startTime,
    stopTime: record.stopTime,
    cancellable: record.cancellable,
    createdAt: record.createdAt,
    settledAccrued: record.settledAccrued.toString(),
    withdrawn: record.withdrawn.toString(),
  };
}

export function toDelegationStateView(state: DelegationState): DelegationStateView {
  switch (state.status) {
    case "active":
      return { status: "active", delegation: toDelegationView(state.delegation) };
    case "settled":
      return {
        status: "settled",
        id: state.id,
        reason: state.reason,
        settledAt: state.settledAt,
      };
    case "unknown":
      return { status: "unknown", id: state.id };
  }
}

export interface WithdrawalView {
  readonly id: DelegationId;
  readonly recipient: Address;
  readonly amount: string;
  readonly completed: boolean;
}

export function toWithdrawalView(result: WithdrawalResult): WithdrawalView {
  return {
    id: result.id,
    recipient: result.recipient,
    amount: result.amount.toString(),
    completed: result.completed,
  };
}

export interface CancellationView {
  readonly id: DelegationId;
  readonly recipientPayout: string;
}

export function toCancellationView(result: CancellationResult): CancellationView {
  return { id: result.id, recipientPayout: result.recipientPayout.toString() };
}
