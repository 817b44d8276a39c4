const cleanupsByHost = new WeakMap<HTMLElement, Array<() => void>>();

export function runViewCleanups(host: HTMLElement): void {
  const cleanups = cleanupsByHost.get(host);
  cleanupsByHost.set(host, []);
  if (!cleanups) return;
  while (cleanups.length) {
    const fn = cleanups.pop();
    if (!fn) continue;
    try {
      fn();
    } catch (err) {
      console.error(err);
    }
  }
}

export function registerViewCleanup(host: HTMLElement, fn: () => void): void {
  let arr = cleanupsByHost.get(host);
  if (!arr) {
    arr = [];
    cleanupsByHost.set(host, arr);
  }
  arr.push(fn);
}
