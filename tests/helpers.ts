// internally the time zone conversions use `getTimezoneOffset`
// so for testing purposes we'll be overriding it
const _getTimezoneOffset = Date.prototype.getTimezoneOffset;

/**
 * Runs `fn` as if the host was `offset` minutes behind UTC, the way
 * `Date.prototype.getTimezoneOffset` counts it
 */
export function withTimezoneOffset(offset: number, fn: () => void): void {
  Date.prototype.getTimezoneOffset = () => offset;
  try {
    fn();
  } finally {
    Date.prototype.getTimezoneOffset = _getTimezoneOffset;
  }
}
