import axios from 'axios';
import { createLogger } from '@workspace/logger';
import { describeEndpoint } from '../endpoint/endpoint.js';
import type { Endpoint } from '../endpoint/types.js';
import { classifyProbeError, extractEgressIp } from './classify.js';
import type {
  BatchOptions,
  ProbeClient,
  ProbeOptions,
  TestErrorClass,
  TestResult,
  TestSummary,
} from './types.js';

const log = createLogger('proxy-tester');

const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
  testUrl: 'http://httpbin.org/ip',
  timeoutMs: 10_000,
  userAgent: 'proxy-broker-tester/1.0',
};

const DEFAULT_MAX_WORKERS = 10;

/**
 * Probes endpoints against an IP-echo URL. Probes never reject: every
 * network, proxy or timeout failure comes back as a classified `TestResult`.
 */
export class ProxyTester {
  private readonly config: ProbeOptions;
  private readonly client: ProbeClient;

  constructor(config?: Partial<ProbeOptions>, client?: ProbeClient) {
    this.config = { ...DEFAULT_PROBE_OPTIONS, ...config };
    this.client = client ?? axios.create({ maxRedirects: 5 });
  }

  async testSingleProxy(
    endpoint: Endpoint,
    options?: Partial<ProbeOptions>,
  ): Promise<TestResult> {
    const { testUrl, timeoutMs, userAgent } = { ...this.config, ...options };
    const target = describeEndpoint(endpoint);
    const startTime = performance.now();
    const elapsed = () => Math.round((performance.now() - startTime) * 100) / 100;

    const failure = (
      errorClass: TestErrorClass,
      error: string,
      statusCode?: number,
    ): TestResult => ({
      endpoint,
      success: false,
      responseTimeMs: elapsed(),
      errorClass,
      error,
      testUrl,
      timestamp: Date.now(),
      ...(statusCode !== undefined && { statusCode }),
    });

    if (endpoint.scheme !== 'http' && endpoint.scheme !== 'https') {
      return failure('unknown', `Unsupported proxy scheme for probing: ${endpoint.scheme}`);
    }

    log.debug('Probing proxy', { endpoint: target, testUrl });

    try {
      const response = await this.client.get<unknown>(testUrl, {
        proxy: {
          protocol: endpoint.scheme,
          host: endpoint.host,
          port: endpoint.port,
          auth: endpoint.username
            ? { username: endpoint.username, password: endpoint.password ?? '' }
            : undefined,
        },
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        validateStatus: () => true,
        headers: { 'User-Agent': userAgent },
      });

      if (response.status === 407) {
        log.warn('Proxy rejected credentials', { endpoint: target });
        return failure('auth', 'Proxy authentication required (407)', 407);
      }

      if (response.status !== 200) {
        log.warn('Proxy probe returned unexpected status', {
          endpoint: target,
          status: response.status,
        });
        return failure('unknown', `HTTP ${response.status}`, response.status);
      }

      const egressIp = extractEgressIp(response.data);
      const responseTimeMs = elapsed();

      log.info('Proxy working', { endpoint: target, responseTimeMs, egressIp });

      return {
        endpoint,
        success: true,
        responseTimeMs,
        statusCode: response.status,
        testUrl,
        timestamp: Date.now(),
        ...(egressIp !== undefined && { egressIp }),
      };
    } catch (error) {
      const errorClass = classifyProbeError(error);
      const message = error instanceof Error ? error.message : String(error);

      log.warn('Proxy probe failed', { endpoint: target, errorClass, error: message });

      return failure(errorClass, message.slice(0, 200));
    }
  }

  /**
   * Probes `endpoints` with at most `maxWorkers` requests in flight. The
   * result at index i always belongs to `endpoints[i]`, whatever order the
   * probes finish in.
   */
  async testBatch(
    endpoints: readonly Endpoint[],
    options?: Partial<BatchOptions>,
  ): Promise<TestResult[]> {
    const { maxWorkers = DEFAULT_MAX_WORKERS, onProgress, ...probe } = options ?? {};
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer (got ${maxWorkers})`);
    }

    const total = endpoints.length;
    const results = new Array<TestResult | undefined>(total);
    let nextIndex = 0;
    let completed = 0;

    log.info('Starting batch proxy test', { total, maxWorkers });

    const runWorker = async (): Promise<void> => {
      while (nextIndex < total) {
        const index = nextIndex;
        nextIndex += 1;

        const endpoint = endpoints[index];
        if (!endpoint) {
          continue;
        }

        results[index] = await this.testSingleProxy(endpoint, probe);
        completed += 1;
        onProgress?.(completed, total);
      }
    };

    const workerCount = Math.min(maxWorkers, Math.max(total, 1));
    await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

    const ordered = results.filter(
      (result): result is TestResult => result !== undefined,
    );
    const summary = summarizeTestResults(ordered);

    log.info('Batch proxy test complete', {
      successful: summary.successful,
      total: summary.total,
      avgResponseTimeMs: Math.round(summary.responseTimeMs.avg),
    });

    return ordered;
  }
}

export function summarizeTestResults(results: readonly TestResult[]): TestSummary {
  const successful = results.filter((result) => result.success);
  const times = successful.map((result) => result.responseTimeMs);
  const errorsByClass: Record<TestErrorClass, number> = {
    timeout: 0,
    auth: 0,
    connection: 0,
    unknown: 0,
  };

  for (const result of results) {
    if (result.errorClass) {
      errorsByClass[result.errorClass] += 1;
    }
  }

  const total = times.reduce((sum, value) => sum + value, 0);

  return {
    total: results.length,
    successful: successful.length,
    failed: results.length - successful.length,
    successRate: results.length > 0 ? (successful.length / results.length) * 100 : 0,
    responseTimeMs: {
      min: times.length > 0 ? Math.min(...times) : 0,
      avg: times.length > 0 ? total / times.length : 0,
      max: times.length > 0 ? Math.max(...times) : 0,
    },
    errorsByClass,
  };
}
