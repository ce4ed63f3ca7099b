export type ModelSelection = {
  model: string;
  source: "default" | "env";
  lane: string;
};

type SelectModelArgs = {
  researchEnv?: string;
  nodeEnv?: string;
  envModel?: string;
  laneOverrides?: Partial<Record<string, string>>;
};

const DEFAULTS_BY_LANE: Record<string, string> = {
  local: "gpt-5-nano",
  staging: "gpt-5-mini",
  prod: "gpt-5.2",
};

export function resolveLane(researchEnv?: string, nodeEnv?: string): string {
  if (researchEnv) return researchEnv;
  if (nodeEnv === "production") return "prod";
  return "local";
}

/**
 * OPENAI_MODEL wins, then a per-lane override (RESEARCH_MODEL_<LANE>), then
 * the lane default.
 */
export function selectModel(args: SelectModelArgs = {}): ModelSelection {
  const lane = resolveLane(args.researchEnv, args.nodeEnv);
  const laneOverride = args.laneOverrides?.[lane];

  if (args.envModel) {
    return { model: args.envModel, source: "env", lane };
  }
  if (laneOverride) {
    return { model: laneOverride, source: "env", lane };
  }
  return { model: DEFAULTS_BY_LANE[lane] ?? DEFAULTS_BY_LANE.local, source: "default", lane };
}

export function laneOverridesFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("RESEARCH_MODEL_") && value) {
      overrides[key.slice("RESEARCH_MODEL_".length).toLowerCase()] = value;
    }
  }
  return overrides;
}
