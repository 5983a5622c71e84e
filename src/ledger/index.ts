export { BudgetLedger } from './ledger.js';
export type { LedgerSnapshot, LedgerView } from './ledger.js';
export { createAsyncMutex } from './mutex.js';
export type { AsyncMutex, ReleaseFn } from './mutex.js';
