/**
 * Env files read at startup, most specific first. Values in an earlier file
 * win over the same key in a later one.
 */
export function envFilePaths(nodeEnv?: string): string[] {
  return [`.env.${nodeEnv || 'development'}`, '.env'];
}
