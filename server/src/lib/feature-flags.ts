export function envBool(key: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined || val === '') return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

export interface FeatureFlags {
  /** Inject the matched taxonomy categories into each extraction prompt. */
  taxonomyContext: boolean;
  /**
   * Fill experience metrics the model left unknown from the parsed work history.
   * When off, model answers are persisted as returned.
   */
  computedExperience: boolean;
}

export function readFeatureFlags(env: NodeJS.ProcessEnv = process.env): FeatureFlags {
  return {
    taxonomyContext: envBool('FF_TAXONOMY_CONTEXT', true, env),
    computedExperience: envBool('FF_COMPUTED_EXPERIENCE', true, env),
  };
}
