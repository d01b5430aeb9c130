// debounce delays execution of fn until after waitMs have elapsed since the
// last call. Used by the watcher, editors tend to fire several change events per save.
export function debounce<TArgs extends unknown[]>(
  func: (...args: TArgs) => unknown,
  waitMs: number,
): (...args: TArgs) => void {
  let timeoutId: NodeJS.Timeout | undefined;

  return (...args: TArgs) => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    timeoutId = setTimeout(() => {
      timeoutId = undefined;
      func(...args);
    }, waitMs);
  };
}
