export type InvariancePolicy = 'fail-closed' | 'log-and-continue';

export interface EngineParameters {
  invariance: {
    policy: InvariancePolicy;
    strict: boolean;
    similarityWarning: number;
    similarityError: number;
  };
  connectivity: {
    maxIsolatedRatio: number;
    minEdgeFloor: number;
  };
  metrics: boolean;
}

function envFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function envPolicy(name: string): InvariancePolicy {
  const raw = (process.env[name] ?? '').trim().toLowerCase();
  return raw === 'fail-closed' ? 'fail-closed' : 'log-and-continue';
}

export const ENGINE_DEFAULTS: EngineParameters = {
  invariance: {
    policy: envPolicy('DIAGRAM_INVARIANCE_POLICY'),
    strict: envFlag('DIAGRAM_INVARIANCE_STRICT', true),
    similarityWarning: 0.95,
    similarityError: 0.8
  },
  connectivity: {
    maxIsolatedRatio: 0.15,
    minEdgeFloor: 10
  },
  metrics: envFlag('DIAGRAM_METRICS', false)
};
