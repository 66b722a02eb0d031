class UnreachableCodeError extends Error {
  name = 'UnreachableCodeError';
  constructor(options?: ErrorOptions) {
    super('Unreachable code was executed', options);
  }
}
function assertUnreachable(value: never): never {
  throw new UnreachableCodeError({
    cause: {
      value,
    },
  });
}
function assert(shouldBeTrue: false, message?: string, options?: ErrorOptions): never;
function assert(shouldBeTrue: boolean, message?: string, options?: ErrorOptions): asserts shouldBeTrue is true;
function assert(shouldBeTrue: boolean, message?: string, options?: ErrorOptions): asserts shouldBeTrue is true {
  if (!shouldBeTrue) {
    throw new Error('Unexpected assertion failure' + (message ? ': ' + message : ''), options);
  }
}
function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
export { UnreachableCodeError, assertUnreachable, assert, isNonNegativeInteger };
