/**
 * Type barrel: re-exports all public types from @ubistream/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  UnixSecondsSchema,
  DelegationIdSchema,
  TransferSchema,
  BurnSchema,
  CreateDelegationSchema,
  WithdrawSchema,
  WithdrawAmountSchema,
  BalanceQuerySchema,
  MaxDelegationsSchema,
  RegistryEntrySchema,
  GovernorSchema,
  ListEventsQuerySchema,
  toCreateDelegationParams,
  toDelegationView,
  toDelegationStateView,
  toWithdrawalView,
  toCancellationView,
} from "./dto.js";
export type {
  TransferDto,
  BurnDto,
  CreateDelegationDto,
  WithdrawDto,
  WithdrawAmountDto,
  BalanceQuery,
  MaxDelegationsDto,
  RegistryEntryDto,
  GovernorDto,
  ListEventsQuery,
  DelegationView,
  DelegationStateView,
  WithdrawalView,
  CancellationView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, CallerEnv } from "./api-contract.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";
