import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadProviderConfigs } from '../config/loader.js';
import { describeEndpoint } from '../endpoint/endpoint.js';
import type { Endpoint } from '../endpoint/types.js';
import {
  ConcurrencyLimitError,
  NoProviderAvailableError,
  ProxyBrokerError,
} from '../errors.js';
import { ProxyManager } from '../manager/proxy-manager.js';
import { ProxyTester, summarizeTestResults } from '../tester/proxy-tester.js';
import type { ProbeClient, TestResult } from '../tester/types.js';
import { formatJson } from '../utils/json.js';
import { booleanFromCliSchema, optionalText, positiveInteger } from './schemas.js';

const testArgsSchema = z.object({
  config: z
    .string({ required_error: 'Missing --config. Provide a provider config JSON file.' })
    .trim()
    .min(1, 'Missing --config. Provide a provider config JSON file.'),
  provider: optionalText('Invalid --provider name'),
  region: optionalText('Invalid --region code'),
  purpose: optionalText('Invalid --purpose'),
  url: z
    .string()
    .url('Invalid --url. Provide an absolute http(s) URL.')
    .optional(),
  count: positiveInteger('count', 5),
  timeout: positiveInteger('timeout', 10_000),
  workers: positiveInteger('workers', 5),
  pretty: booleanFromCliSchema.optional().default('false'),
});

type TestArgs = z.infer<typeof testArgsSchema>;

type TestReportRow = {
  endpoint: string;
  provider: string;
  session?: string;
  region?: string;
  success: boolean;
  responseTimeMs: number;
  statusCode?: number;
  egressIp?: string;
  errorClass?: string;
  error?: string;
};

/**
 * Acquires up to `count` endpoints from the configured providers, probes them
 * in parallel and prints the probe summary with the manager's usage stats.
 */
async function runTestAction(args: TestArgs, client?: ProbeClient): Promise<number> {
  let manager: ProxyManager;
  try {
    manager = new ProxyManager(loadProviderConfigs(args.config));
  } catch (error) {
    if (error instanceof ProxyBrokerError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  const endpoints: Endpoint[] = [];
  let results: TestResult[];

  try {
    acquireEndpoints(manager, args, endpoints);

    const tester = new ProxyTester(
      {
        ...(args.url !== undefined && { testUrl: args.url }),
        timeoutMs: args.timeout,
      },
      client,
    );

    results = await tester.testBatch(endpoints, {
      maxWorkers: args.workers,
      onProgress: (completed, total) => {
        log.info(`Tested ${completed}/${total} proxies`);
      },
    });

    for (const result of results) {
      manager.recordRequest(result.endpoint, { success: result.success });
    }
  } catch (error) {
    if (error instanceof ProxyBrokerError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    for (const endpoint of endpoints) {
      manager.release(endpoint, 'health-check-complete');
    }
  }

  console.log(
    formatJson(
      {
        summary: summarizeTestResults(results),
        results: results.map(toReportRow),
        stats: manager.getStats(),
      },
      args.pretty,
    ),
  );

  return 0;
}

// Fills `endpoints` in place so the caller can release a partial batch.
function acquireEndpoints(
  manager: ProxyManager,
  args: TestArgs,
  endpoints: Endpoint[],
): void {
  for (let index = 0; index < args.count; index += 1) {
    try {
      endpoints.push(
        manager.acquire({
          name: args.provider,
          region: args.region,
          purpose: args.purpose ?? 'health-check',
        }),
      );
    } catch (error) {
      if (
        error instanceof ConcurrencyLimitError ||
        error instanceof NoProviderAvailableError
      ) {
        log.warn(`Stopped after ${endpoints.length} endpoints: ${error.message}`);
        return;
      }
      throw error;
    }
  }
}

function toReportRow(result: TestResult): TestReportRow {
  return {
    endpoint: describeEndpoint(result.endpoint),
    provider: result.endpoint.provider,
    session: result.endpoint.session,
    region: result.endpoint.region,
    success: result.success,
    responseTimeMs: result.responseTimeMs,
    statusCode: result.statusCode,
    egressIp: result.egressIp,
    errorClass: result.errorClass,
    error: result.error,
  };
}

export { testArgsSchema, runTestAction, toReportRow };
export type { TestArgs, TestReportRow };
