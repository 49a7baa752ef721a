const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

/** TICKGRAPH_DEBUG=1 only; other spellings do not count */
export function isTickgraphDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TICKGRAPH_DEBUG === '1';
}

/** Generic DEBUG_MODE switch shared with other tools */
export function isGenericDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthy(env.DEBUG_MODE);
}

export function isDebugLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTickgraphDebugEnabled(env) || isGenericDebugEnabled(env);
}
