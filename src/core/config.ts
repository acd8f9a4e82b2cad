import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { AiProvider, ModelProfileName } from "./types.js";

export const CONFIG_FILE_NAME = "scope-sentinel.config.json";

export interface ModelProfile {
  name: Exclude<ModelProfileName, "auto">;
  contextTokens: number;
  maxOutputTokens: number;
  chunkTokenLimit: number;
  retrievalTopK: number;
  fewShotEnabled: boolean;
  constrainedDecoding: boolean;
}

// 7B-class models lose quality well before their advertised window.
export const MODEL_PROFILES: Record<ModelProfile["name"], ModelProfile> = {
  default: {
    name: "default",
    contextTokens: 128_000,
    maxOutputTokens: 4096,
    chunkTokenLimit: 512,
    retrievalTopK: 5,
    fewShotEnabled: true,
    constrainedDecoding: false
  },
  small: {
    name: "small",
    contextTokens: 6144,
    maxOutputTokens: 2048,
    chunkTokenLimit: 256,
    retrievalTopK: 3,
    fewShotEnabled: false,
    constrainedDecoding: true
  }
};

export const DEFAULT_SMALL_MODEL_PATTERNS = [
  "qwen.*\\b7b\\b",
  "llama.*\\b8b\\b",
  "mistral.*\\b7b\\b",
  "phi-?3",
  "gemma.*\\b(2|7|9)b\\b"
];

export interface RetrievalWeights {
  vector: number;
  graph: number;
  relational: number;
}

export interface SentinelConfig {
  projectId?: string;
  docsDir: string;
  provider: AiProvider;
  model?: string;
  profile: ModelProfileName;
  smallModelPatterns: string[];
  maxRetries: number;
  approvalThreshold: number;
  aiTimeoutSec: number;
  retrieval: {
    weights: RetrievalWeights;
    maxHops: number;
    relationalLimit: number;
  };
  summarizer: {
    maxExcerpts: number;
    maxHunkChars: number;
  };
}

export const DEFAULT_CONFIG: SentinelConfig = {
  docsDir: "docs/design",
  provider: "auto",
  profile: "auto",
  smallModelPatterns: DEFAULT_SMALL_MODEL_PATTERNS,
  maxRetries: 2,
  approvalThreshold: 0.6,
  aiTimeoutSec: 600,
  retrieval: {
    weights: { vector: 1, graph: 1, relational: 1 },
    maxHops: 2,
    relationalLimit: 5
  },
  summarizer: {
    maxExcerpts: 12,
    maxHunkChars: 1200
  }
};

const configFileSchema = z
  .object({
    projectId: z.string().min(1).optional(),
    docsDir: z.string().min(1).optional(),
    provider: z.enum(["auto", "codex", "claude"]).optional(),
    model: z.string().min(1).optional(),
    profile: z.enum(["auto", "default", "small"]).optional(),
    smallModelPatterns: z.array(z.string().min(1)).optional(),
    maxRetries: z.number().int().min(0).max(10).optional(),
    approvalThreshold: z.number().min(0).max(1).optional(),
    aiTimeoutSec: z.number().int().min(10).max(4 * 60 * 60).optional(),
    retrieval: z
      .object({
        weights: z
          .object({
            vector: z.number().min(0),
            graph: z.number().min(0),
            relational: z.number().min(0)
          })
          .refine((weights) => weights.vector + weights.graph + weights.relational > 0, {
            message: "at least one retrieval weight must be positive"
          })
          .optional(),
        maxHops: z.number().int().min(1).max(6).optional(),
        relationalLimit: z.number().int().min(1).max(50).optional()
      })
      .strict()
      .optional(),
    summarizer: z
      .object({
        maxExcerpts: z.number().int().min(1).max(100).optional(),
        maxHunkChars: z.number().int().min(80).max(20_000).optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function parseConfigFile(raw: string, source: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${source} is not valid JSON.`, { cause: error });
  }
  const validated = configFileSchema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Config file ${source} is invalid: ${issues.join("; ")}`, { details: { issues } });
  }
  return validated.data;
}

export function readConfigFile(repoDir: string): ConfigFile {
  const path = join(repoDir, CONFIG_FILE_NAME);
  if (!existsSync(path)) return {};
  return parseConfigFile(readFileSync(path, "utf8"), path);
}

function readEnvironmentOverrides(env: NodeJS.ProcessEnv): ConfigFile {
  const overrides: ConfigFile = {};
  const model = env.SCOPE_SENTINEL_MODEL?.trim();
  if (model) overrides.model = model;

  const provider = env.SCOPE_SENTINEL_PROVIDER?.trim().toLowerCase();
  if (provider) {
    if (provider !== "auto" && provider !== "codex" && provider !== "claude") {
      throw new ConfigError(`Invalid SCOPE_SENTINEL_PROVIDER "${provider}". Expected auto, codex or claude.`);
    }
    overrides.provider = provider;
  }

  const profile = env.SCOPE_SENTINEL_PROFILE?.trim().toLowerCase();
  if (profile) {
    if (profile !== "auto" && profile !== "default" && profile !== "small") {
      throw new ConfigError(`Invalid SCOPE_SENTINEL_PROFILE "${profile}". Expected auto, default or small.`);
    }
    overrides.profile = profile;
  }
  return overrides;
}

function mergeLayer(base: SentinelConfig, layer: ConfigFile): SentinelConfig {
  return {
    ...base,
    ...(layer.projectId !== undefined ? { projectId: layer.projectId } : {}),
    ...(layer.docsDir !== undefined ? { docsDir: layer.docsDir } : {}),
    ...(layer.provider !== undefined ? { provider: layer.provider } : {}),
    ...(layer.model !== undefined ? { model: layer.model } : {}),
    ...(layer.profile !== undefined ? { profile: layer.profile } : {}),
    ...(layer.smallModelPatterns !== undefined ? { smallModelPatterns: layer.smallModelPatterns } : {}),
    ...(layer.maxRetries !== undefined ? { maxRetries: layer.maxRetries } : {}),
    ...(layer.approvalThreshold !== undefined ? { approvalThreshold: layer.approvalThreshold } : {}),
    ...(layer.aiTimeoutSec !== undefined ? { aiTimeoutSec: layer.aiTimeoutSec } : {}),
    retrieval: {
      weights: layer.retrieval?.weights ?? base.retrieval.weights,
      maxHops: layer.retrieval?.maxHops ?? base.retrieval.maxHops,
      relationalLimit: layer.retrieval?.relationalLimit ?? base.retrieval.relationalLimit
    },
    summarizer: {
      maxExcerpts: layer.summarizer?.maxExcerpts ?? base.summarizer.maxExcerpts,
      maxHunkChars: layer.summarizer?.maxHunkChars ?? base.summarizer.maxHunkChars
    }
  };
}

/** Layers, lowest precedence first: defaults, config file, environment, CLI flags. */
export function resolveConfig(options: {
  repoDir: string;
  flags?: ConfigFile;
  env?: NodeJS.ProcessEnv;
}): SentinelConfig {
  const fileLayer = readConfigFile(options.repoDir);
  const envLayer = readEnvironmentOverrides(options.env ?? process.env);
  return [fileLayer, envLayer, options.flags ?? {}].reduce(mergeLayer, DEFAULT_CONFIG);
}

export function isSmallModel(modelId: string | undefined, patterns: string[]): boolean {
  if (!modelId) return false;
  const lower = modelId.toLowerCase();
  for (const pattern of patterns) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, "i");
    } catch (error) {
      throw new ConfigError(`Invalid small-model pattern "${pattern}".`, { cause: error });
    }
    if (regex.test(lower)) return true;
  }
  return false;
}

export function resolveModelProfile(config: Pick<SentinelConfig, "profile" | "model" | "smallModelPatterns">): ModelProfile {
  if (config.profile === "small") return MODEL_PROFILES.small;
  if (config.profile === "default") return MODEL_PROFILES.default;
  return isSmallModel(config.model, config.smallModelPatterns) ? MODEL_PROFILES.small : MODEL_PROFILES.default;
}
