import type { SearchAlgorithm } from './SearchAlgorithm';
class TableMismatchError extends Error {
  name = 'TableMismatchError';
  constructor(tableName: string, expectedLength: number, actualLength: number, options?: ErrorOptions) {
    super(`${tableName} has ${actualLength} entries, expected ${expectedLength}`, options);
  }
}
class UnsupportedAlgorithmError extends Error {
  name = 'UnsupportedAlgorithmError';
  constructor(algorithm: SearchAlgorithm, options?: ErrorOptions) {
    super(`${algorithm} search requires a byte pattern`, options);
  }
}
export { TableMismatchError, UnsupportedAlgorithmError };
