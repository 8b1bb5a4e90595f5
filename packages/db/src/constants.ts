/** Key of the transaction-scoped advisory lock that serializes registry writes. */
export const REGISTRY_LOCK_KEY = 4_217_497;
