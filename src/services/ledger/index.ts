export {
  Ledger,
  LedgerOperation,
  LedgerOptions,
  LedgerResult,
  LedgerSnapshot,
} from './ledger.service';
