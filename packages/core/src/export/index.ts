export {
  INVENTORY_CSV_HEADER,
  TRANSACTIONS_CSV_HEADER,
  toCsv,
  inventoryToCsv,
  transactionsToCsv,
} from './csv.js';
