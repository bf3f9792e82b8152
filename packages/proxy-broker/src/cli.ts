import { z } from 'zod';
import { detectArgsSchema, runDetectAction } from './actions/detect.js';
import { runTestAction, testArgsSchema } from './actions/test.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('test'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('detect'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`proxy-broker CLI

Usage:
  proxy-broker help
  proxy-broker test --config=./proxies.json
  proxy-broker test --config=./proxies.json --provider=static-us --count=20 --workers=10
  proxy-broker test --config=./proxies.json --region=GB --url="https://api.ipify.org?format=json"
  proxy-broker detect --file=./proxies.txt --pretty

Commands:
  help    Show this help message
  test    Acquire endpoints from configured providers and probe them in parallel
  detect  Classify a list of proxy strings (provider, type, session, region)

Test options:
  --config   Required. Provider config JSON (array or { "providers": [...] }).
  --provider Optional. Only acquire from this provider (default: cheapest with capacity).
  --count    Optional. Endpoints to acquire and probe (default: 5).
  --region   Optional. Region/country code passed to providers.
  --purpose  Optional. Purpose tag recorded by the meter (default: health-check).
  --url      Optional. IP-echo URL to probe (default: http://httpbin.org/ip).
  --timeout  Optional. Per-probe timeout in milliseconds (default: 10000).
  --workers  Optional. Probes in flight at once (default: 5).
  --pretty   Optional. Pretty-print JSON output.

Detect options:
  --file     Required. File with one proxy per line (or comma separated).
  --pretty   Optional. Pretty-print JSON output.
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'test') {
    const parsedTestArgs = testArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedTestArgs.success) {
      console.error(
        parsedTestArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runTestAction(parsedTestArgs.data);
  }

  if (parsedCliInput.data.command === 'detect') {
    const parsedDetectArgs = detectArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedDetectArgs.success) {
      console.error(
        parsedDetectArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runDetectAction(parsedDetectArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
