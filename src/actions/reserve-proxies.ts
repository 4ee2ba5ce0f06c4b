/**
 * Reserve proxy pool backed by reserve_proxy.txt
 *
 * Taking a proxy removes its line from the file, so a reserve proxy is handed
 * out once across runs.
 */

import { parseProxy, readLines, removeLines } from '../utils/files';
import { createLogger, maskProxy } from '../utils/logger';

const log = createLogger('proxies');

export class ReserveProxyPool {
  constructor(private readonly filePath: string) {}

  /**
   * Next valid reserve proxy, or null when the file has none left.
   * Invalid lines met on the way are dropped too.
   */
  take(): string | null {
    const consumed: string[] = [];
    let proxy: string | null = null;

    for (const line of readLines(this.filePath)) {
      consumed.push(line);
      proxy = parseProxy(line);
      if (proxy) break;
      log.warn('Dropping invalid reserve proxy line');
    }

    if (consumed.length > 0) {
      removeLines(this.filePath, consumed);
    }
    if (proxy) {
      log.info('Reserve proxy taken', { proxy: maskProxy(proxy) });
    }
    return proxy;
  }

  remaining(): number {
    return readLines(this.filePath).length;
  }
}
