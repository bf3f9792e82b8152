import type { AxiosInstance } from 'axios';
import type { Endpoint } from '../endpoint/types.js';

type TestErrorClass = 'timeout' | 'auth' | 'connection' | 'unknown';

type TestResult = {
  endpoint: Endpoint;
  success: boolean;
  responseTimeMs: number;
  statusCode?: number;
  /** Egress address reported by the echo service; only set on success. */
  egressIp?: string;
  errorClass?: TestErrorClass;
  error?: string;
  testUrl: string;
  timestamp: number;
};

type ProbeOptions = {
  testUrl: string;
  timeoutMs: number;
  userAgent: string;
};

type BatchOptions = ProbeOptions & {
  maxWorkers: number;
  onProgress?: (completed: number, total: number) => void;
};

type ProbeClient = Pick<AxiosInstance, 'get'>;

type TestSummary = {
  total: number;
  successful: number;
  failed: number;
  successRate: number;
  responseTimeMs: {
    min: number;
    avg: number;
    max: number;
  };
  errorsByClass: Record<TestErrorClass, number>;
};

export type {
  TestErrorClass,
  TestResult,
  ProbeOptions,
  BatchOptions,
  ProbeClient,
  TestSummary,
};
