import type { Severity } from '../analysis/types';
import type { SeverityPolicy, SeveritySignal } from './types';

export function resolveSeverity(policy: SeverityPolicy, signal: SeveritySignal): Severity {
  if (signal === null || signal === undefined) return policy.fallback;
  return policy.table[String(signal)] ?? policy.fallback;
}
