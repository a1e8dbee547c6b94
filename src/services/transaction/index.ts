export {
  TransactionController,
  TransactionMessage,
  formatBalances,
} from './transaction.controller';
export { amountValidation, MAX_AMOUNT } from './transaction.validation';
export { createTransactionRoutes, isBodyReadError } from './transaction.routes';
