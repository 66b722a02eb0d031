export { type Maybe, MaybeType, Some, None, isSome, isNone, unwrapMaybeOr } from './common/maybe';
export { Lazy } from './common/Lazy';
export { UnreachableCodeError } from './common/util';
export * from './search';
