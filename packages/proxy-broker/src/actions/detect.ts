import { readFileSync } from 'node:fs';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { detectProxy, type ProxyDetection } from '../detect/proxy-detector.js';
import { splitEntries } from '../endpoint/proxy-string.js';
import { formatJson } from '../utils/json.js';
import { booleanFromCliSchema } from './schemas.js';

const detectArgsSchema = z.object({
  file: z
    .string({ required_error: 'Missing --file. Provide a file with one proxy per line.' })
    .trim()
    .min(1, 'Missing --file. Provide a file with one proxy per line.'),
  pretty: booleanFromCliSchema.optional().default('false'),
});

type DetectArgs = z.infer<typeof detectArgsSchema>;

type DetectionRow = Omit<ProxyDetection, 'password'> & {
  hasPassword: boolean;
};

type DetectionReport = {
  detected: DetectionRow[];
  invalid: string[];
};

function detectProxyList(raw: string): DetectionReport {
  const report: DetectionReport = { detected: [], invalid: [] };

  for (const line of splitEntries(raw)) {
    if (line.startsWith('#')) {
      continue;
    }

    const detection = detectProxy(line);
    if (!detection) {
      report.invalid.push(line);
      continue;
    }

    const { password, ...rest } = detection;
    report.detected.push({ ...rest, hasPassword: Boolean(password) });
  }

  return report;
}

async function runDetectAction(args: DetectArgs): Promise<number> {
  let raw: string;
  try {
    raw = readFileSync(args.file, 'utf-8');
  } catch (error) {
    log.error(`Cannot read proxy list: ${args.file}`, error);
    return 1;
  }

  const report = detectProxyList(raw);
  if (report.invalid.length > 0) {
    log.warn(`Skipped ${report.invalid.length} unparseable lines`);
  }

  console.log(formatJson(report, args.pretty));
  return 0;
}

export { detectArgsSchema, detectProxyList, runDetectAction };
export type { DetectArgs, DetectionReport, DetectionRow };
