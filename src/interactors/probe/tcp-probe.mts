import net from 'node:net';

import type { Logger } from '../../logger.mts';
import type {
  ReachabilityProbe,
} from '../../services/dns-reconciler/types.mts';

function attempt(host: string, port: number, timeoutMs: number) {
  return new Promise<boolean>((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (reachable: boolean) => {
      socket.destroy();
      resolve(reachable);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      finish(true);
    });
    socket.once('timeout', () => {
      finish(false);
    });
    socket.once('error', () => {
      finish(false);
    });
  });
}

/**
 * Liveness check against the management port. A refused connection counts
 * as offline too, since nothing could be managed on that host anyway.
 */
export class TcpReachabilityProbe implements ReachabilityProbe {
  private port: number;
  private logger: Logger;

  public constructor(port: number, logger: Logger) {
    this.port = port;
    this.logger = logger;
  }

  public async probe(host: string, attempts: number, timeoutMs: number) {
    for (let i = 1; i <= attempts; i += 1) {
      if (await attempt(host, this.port, timeoutMs)) {
        return true;
      }
      this.logger.debug({ host, attempt: i }, 'Probe attempt failed');
    }
    return false;
  }
}
