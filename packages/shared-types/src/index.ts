export {
  TITLE_MIN_LENGTH,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  characterLength,
  isTodoRecord,
  type Todo,
  type TodoCreateInput,
  type TodoUpdateInput,
  type TodoStats,
  type TodoAnalysis,
} from './todo.js';

export { normalizeDueDate, isBefore, toDateOnly, formatDateTime } from './dates.js';
