/**
 * Proxy Health Checker
 * Probes an IP-echo endpoint through a candidate proxy
 */

import http from 'http';
import https from 'https';
import { URL } from 'url';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { RotatorErrorType, errorMessage } from '../errors';
import { getRandomUserAgent } from './proxy.headers';
import { HealthResult, ProxyProtocol, ProxyRecord, proxyUrl } from './proxy.types';

export interface ProbeResponse {
  statusCode: number;
  body: string;
}

/**
 * Build the agent that routes a request for targetUrl through the record
 */
export function createProxyAgent(record: ProxyRecord, targetUrl: URL): http.Agent {
  const url = proxyUrl(record);

  switch (record.protocol) {
    case ProxyProtocol.SOCKS4:
    case ProxyProtocol.SOCKS5:
      return new SocksProxyAgent(url);
    default:
      return targetUrl.protocol === 'https:' ? new HttpsProxyAgent(url) : new HttpProxyAgent(url);
  }
}

export class ProxyHealthChecker {
  private readonly testUrl: string;
  private readonly defaultTimeout: number;

  constructor(testUrl: string = 'http://icanhazip.com', defaultTimeout: number = 3000) {
    this.testUrl = testUrl;
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Check health of a single proxy. Never throws: failures come back as working=false.
   */
  async test(record: ProxyRecord, timeout?: number): Promise<HealthResult> {
    const checkTimeout = timeout ?? this.defaultTimeout;
    const startTime = Date.now();

    try {
      const target = new URL(this.testUrl);
      const response = await this.makeRequest(target, createProxyAgent(record, target), checkTimeout);
      const latencyMs = Date.now() - startTime;

      if (response.statusCode < 200 || response.statusCode >= 300) {
        return {
          working: false,
          latencyMs,
          failure: {
            type: RotatorErrorType.HEALTH_CHECK_FAILURE,
            message: `HTTP ${response.statusCode}`,
            statusCode: response.statusCode,
          },
        };
      }

      return {
        working: true,
        observedIp: response.body.trim() || undefined,
        latencyMs,
      };
    } catch (error: unknown) {
      return {
        working: false,
        failure: {
          type: RotatorErrorType.HEALTH_CHECK_FAILURE,
          message: errorMessage(error) || 'Unknown error',
        },
      };
    }
  }

  /**
   * Check health of multiple proxies concurrently
   */
  async testBatch(records: readonly ProxyRecord[], timeout?: number, concurrency: number = 5): Promise<HealthResult[]> {
    const results: HealthResult[] = [];

    for (let i = 0; i < records.length; i += concurrency) {
      const batch = records.slice(i, i + concurrency);
      const batchResults = await Promise.all(
        batch.map(record => this.test(record, timeout))
      );
      results.push(...batchResults);
    }

    return results;
  }

  /**
   * Make HTTP/HTTPS request through the agent
   */
  private makeRequest(target: URL, agent: http.Agent, timeout: number): Promise<ProbeResponse> {
    return new Promise((resolve, reject) => {
      const requestModule = target.protocol === 'https:' ? https : http;
      let settled = false;

      const timer = setTimeout(() => {
        req.destroy(new Error('Request timeout'));
      }, timeout);

      const finish = (fn: () => void): void => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          fn();
        }
      };

      const req = requestModule.request(target, {
        method: 'GET',
        agent,
        headers: {
          'User-Agent': getRandomUserAgent(),
        },
      }, (res) => {
        let data = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('end', () => {
          finish(() => resolve({ statusCode: res.statusCode ?? 0, body: data }));
        });
        res.on('error', (error) => {
          finish(() => reject(error));
        });
      });

      req.on('error', (error) => {
        finish(() => reject(error));
      });

      req.end();
    });
  }
}
