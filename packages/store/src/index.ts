export { TransactionIndex } from './transaction-index.ts';
export { TransactionStore, type LoadFill } from './transaction-store.ts';
export {
  INDEX_NAMES,
  type DateBounds,
  type IndexName,
  type StoreReader,
  type StoreState,
  type StoreWriter,
} from './types.ts';
