import http from 'http';
import https from 'https';
import { URL } from 'url';

export type ProbeResult = {
  reachable: boolean;
  statusCode: number | null;
  error: string | null;
  timeout?: boolean;
};

/**
 * Send a HEAD request to `url` and report whether anything answered.
 *
 * Any HTTP response, whatever its status, proves the network path works;
 * only connection errors and timeouts count as unreachable.
 */
export function probeReachability(url: string, timeoutMs: number): Promise<ProbeResult> {
  return new Promise((resolve) => {
    const urlObj = new URL(url);
    const isHttps = urlObj.protocol === 'https:';
    const httpModule = isHttps ? https : http;

    const options = {
      hostname: urlObj.hostname,
      port: urlObj.port || (isHttps ? 443 : 80),
      path: urlObj.pathname + urlObj.search,
      method: 'HEAD',
      timeout: timeoutMs
    };

    const req = httpModule.request(options, (res) => {
      res.resume();
      resolve({
        reachable: true,
        statusCode: res.statusCode ?? null,
        error: null
      });
    });

    req.on('error', (error) => {
      resolve({
        reachable: false,
        statusCode: null,
        error: error.message
      });
    });

    req.on('timeout', () => {
      req.destroy();
      resolve({
        reachable: false,
        statusCode: null,
        error: 'Request timeout',
        timeout: true
      });
    });

    req.end();
  });
}
