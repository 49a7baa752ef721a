/**
 * Scheduler Errors
 *
 * All configuration failures surface as SchedulerError with a stable code so
 * callers can branch without matching on message text.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SchedulerErrorCodes = {
  MISSING_GRAPH_SOURCE: 'MISSING_GRAPH_SOURCE',
  MISSING_TERMINATION_CONDITION: 'MISSING_TERMINATION_CONDITION',
  UNKNOWN_NODE: 'UNKNOWN_NODE',
  MALFORMED_CONSIDERATION_QUEUE: 'MALFORMED_CONSIDERATION_QUEUE',
  INVALID_CONDITION: 'INVALID_CONDITION',
  STALE_CURSOR: 'STALE_CURSOR',
  INVALID_SCHEDULE_FILE: 'INVALID_SCHEDULE_FILE',
  CYCLIC_GRAPH: 'CYCLIC_GRAPH',
} as const;

export type SchedulerErrorCode = (typeof SchedulerErrorCodes)[keyof typeof SchedulerErrorCodes];

export const SchedulerErrorMessages: Record<SchedulerErrorCode, string> = {
  [SchedulerErrorCodes.MISSING_GRAPH_SOURCE]:
    'A Scheduler needs a composition, a graph, or a node list with a consideration queue',
  [SchedulerErrorCodes.MISSING_TERMINATION_CONDITION]: 'Missing termination condition',
  [SchedulerErrorCodes.UNKNOWN_NODE]: 'Unknown node',
  [SchedulerErrorCodes.MALFORMED_CONSIDERATION_QUEUE]: 'Malformed consideration queue',
  [SchedulerErrorCodes.INVALID_CONDITION]: 'Invalid condition',
  [SchedulerErrorCodes.STALE_CURSOR]: 'Cursor belongs to a superseded run',
  [SchedulerErrorCodes.INVALID_SCHEDULE_FILE]: 'Invalid schedule file',
  [SchedulerErrorCodes.CYCLIC_GRAPH]: 'Dependency graph contains a cycle',
};

// ============================================================================
// SchedulerError Class
// ============================================================================

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;
  readonly data?: unknown;

  constructor(code: SchedulerErrorCode, message?: string, data?: unknown) {
    super(message || SchedulerErrorMessages[code]);
    this.name = 'SchedulerError';
    this.code = code;
    this.data = data;
  }

  static fromCode(code: SchedulerErrorCode, data?: unknown): SchedulerError {
    return new SchedulerError(code, SchedulerErrorMessages[code], data);
  }

  static missingGraphSource(): SchedulerError {
    return SchedulerError.fromCode(SchedulerErrorCodes.MISSING_GRAPH_SOURCE);
  }

  static missingTermination(scale: string): SchedulerError {
    return new SchedulerError(
      SchedulerErrorCodes.MISSING_TERMINATION_CONDITION,
      `Must specify a ${scale} termination condition (terminationConds.${scale})`,
      { scale }
    );
  }

  static unknownNode(node: unknown, context?: string): SchedulerError {
    const where = context ? ` (${context})` : '';
    return new SchedulerError(
      SchedulerErrorCodes.UNKNOWN_NODE,
      `Unknown node: ${String(node)}${where}`,
      { node }
    );
  }

  static malformedQueue(details: string): SchedulerError {
    return new SchedulerError(
      SchedulerErrorCodes.MALFORMED_CONSIDERATION_QUEUE,
      `Malformed consideration queue: ${details}`
    );
  }

  static invalidCondition(details: string): SchedulerError {
    return new SchedulerError(SchedulerErrorCodes.INVALID_CONDITION, `Invalid condition: ${details}`);
  }

  static staleCursor(): SchedulerError {
    return SchedulerError.fromCode(SchedulerErrorCodes.STALE_CURSOR);
  }

  static invalidScheduleFile(
    details: string,
    errors: Array<{ path: string; message: string }> = []
  ): SchedulerError {
    return new SchedulerError(
      SchedulerErrorCodes.INVALID_SCHEDULE_FILE,
      `Invalid schedule file: ${details}`,
      { errors }
    );
  }
}

/**
 * Raised while layering a dependency graph that is not acyclic.
 * `remaining` holds the nodes that could not be layered and their
 * unresolved prerequisites.
 */
export class CyclicGraphError<N = unknown> extends SchedulerError {
  readonly remaining: ReadonlyMap<N, N[]>;

  constructor(remaining: ReadonlyMap<N, N[]>) {
    const described = Array.from(remaining.entries())
      .map(([node, deps]) => `${String(node)} <- [${deps.map(String).join(', ')}]`)
      .join('; ');
    super(SchedulerErrorCodes.CYCLIC_GRAPH, `Dependency graph contains a cycle: ${described}`);
    this.name = 'CyclicGraphError';
    this.remaining = remaining;
  }
}
