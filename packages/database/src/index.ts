export { createTodoStore, storeConfigFromEnv, type TodoStoreConfig } from './client.js';
export {
  JsonTodoStore,
  parseTodos,
  type TodoStore,
  type JsonTodoStoreOptions,
} from './json-store.js';
export {
  TodoError,
  ValidationError,
  NotFoundError,
  StoreIOError,
  isTodoError,
  type TodoErrorKind,
} from './errors.js';
export {
  validateTitle,
  validateDescription,
  validateCompleted,
  validateDueDate,
} from './validation.js';
