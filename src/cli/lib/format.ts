import type { ConsiderationQueue } from '../../scheduler/index.js';

export function formatTimeStep(index: number, nodes: readonly string[]): string {
  return nodes.length === 0 ? `[${index}] (stalled pass)` : `[${index}] ${nodes.join(', ')}`;
}

export function formatConsiderationQueue(queue: ConsiderationQueue<string>): string[] {
  return queue.map((layer, index) => `layer ${index}: ${Array.from(layer).sort().join(', ')}`);
}

export function formatIssues(issues: ReadonlyArray<{ path: string; message: string }>): string[] {
  return issues.map((issue) => `  ${issue.path}: ${issue.message}`);
}
