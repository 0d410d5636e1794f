import { StorageError } from '../errors.js';

/**
 * Run a storage call, translating whatever it throws into a StorageError
 */
export async function withStorageErrors<T>(
  context: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw StorageError.from(error, context);
  }
}
