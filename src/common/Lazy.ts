import { Maybe, None, Some, isSome } from './maybe';
class Lazy<T> {
  private $p_compute: () => T;
  private $p_computedValueMaybe: Maybe<T> = None;
  constructor(compute: () => T) {
    this.$p_compute = compute;
  }
  get isComputed(): boolean {
    return isSome(this.$p_computedValueMaybe);
  }
  get value(): T {
    if (isSome(this.$p_computedValueMaybe)) {
      return this.$p_computedValueMaybe.$m_value;
    }
    const value = this.$p_compute();
    this.$p_computedValueMaybe = Some(value);
    return value;
  }
}
export { Lazy };
