import path from 'node:path';
import { JsonTodoStore, type TodoStore } from './json-store.js';

/**
 * Store configuration, usually read from the environment
 */
export interface TodoStoreConfig {
  /** JSON data file */
  dataFile: string;
  /** Sample file used to seed a missing data file */
  sampleFile?: string;
}

/**
 * Create a todo store instance
 *
 * @param config - Data file locations (relative paths resolve against the working directory)
 * @returns Store backed by the JSON data file
 */
export function createTodoStore(config: TodoStoreConfig): TodoStore {
  return new JsonTodoStore({
    filePath: path.resolve(config.dataFile),
    samplePath: config.sampleFile ? path.resolve(config.sampleFile) : undefined,
  });
}

/**
 * Store configuration from TODO_DATA_FILE / TODO_SAMPLE_FILE
 */
export function storeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TodoStoreConfig {
  return {
    dataFile: env['TODO_DATA_FILE'] ?? 'todo_data.json',
    sampleFile: env['TODO_SAMPLE_FILE'] ?? 'todo_data.sample.json',
  };
}
