import { readFile } from "node:fs/promises";
import { z } from "zod/v4";

import { MemoryError } from "./errors";
import { isNotFound, writeFileAtomicWithBackup } from "./fsutil/atomic";
import { MEMORY_TOOL_NAMES } from "./types";

export const PROVIDER_NAMES = ["openai", "openrouter", "requesty", "zai", "generic"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

const providerNameSchema = z.enum(PROVIDER_NAMES);

const providerEndpointSchema = z.object({
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  apiKeyEnv: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
});

const settingsFileSchema = z.object({
  memory: z
    .object({
      enabled: z.boolean().optional(),
      bufferSize: z.number().int().min(1).max(65536).optional(),
      embeddingsEnabled: z.boolean().optional(),
      embeddingProvider: z.union([providerNameSchema, z.literal("")]).optional(),
      embeddingModel: z.string().optional(),
    })
    .optional(),
  model: z
    .object({
      provider: z.union([providerNameSchema, z.literal("none")]).optional(),
      name: z.string().optional(),
    })
    .optional(),
  providers: z
    .object({
      openai: providerEndpointSchema.optional(),
      openrouter: providerEndpointSchema.optional(),
      requesty: providerEndpointSchema.optional(),
      zai: providerEndpointSchema.optional(),
      generic: providerEndpointSchema.optional(),
    })
    .optional(),
  policy: z
    .object({
      allowedTools: z.array(z.string()).optional(),
    })
    .optional(),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export interface ProviderEndpoint {
  baseUrl: string;
  apiKey?: string;
  apiKeyEnv?: string;
  headers: Record<string, string>;
}

export interface Settings {
  memory: {
    enabled: boolean;
    bufferSize: number;
    embeddingsEnabled: boolean;
    embeddingProvider: ProviderName | "";
    embeddingModel: string;
  };
  model: {
    provider: ProviderName | "none";
    name: string;
  };
  providers: Record<ProviderName, ProviderEndpoint>;
  policy: {
    allowedTools: string[];
  };
}

const DEFAULT_PROVIDERS: Record<ProviderName, ProviderEndpoint> = {
  openai: { baseUrl: "https://api.openai.com/v1", apiKeyEnv: "OPENAI_API_KEY", headers: {} },
  openrouter: { baseUrl: "https://openrouter.ai/api/v1", apiKeyEnv: "OPENROUTER_API_KEY", headers: {} },
  requesty: { baseUrl: "https://router.requesty.ai/v1", apiKeyEnv: "REQUESTY_API_KEY", headers: {} },
  zai: { baseUrl: "https://api.z.ai/api/coding/paas/v4", apiKeyEnv: "ZAI_API_KEY", headers: {} },
  generic: { baseUrl: "", apiKeyEnv: "OPENAI_COMPAT_API_KEY", headers: {} },
};

export function defaultSettings(): Settings {
  return resolveSettings({});
}

function resolveProvider(name: ProviderName, file: SettingsFile): ProviderEndpoint {
  const fallback = DEFAULT_PROVIDERS[name];
  const configured = file.providers?.[name];
  if (configured?.baseUrl) {
    return {
      baseUrl: configured.baseUrl,
      apiKey: configured.apiKey,
      apiKeyEnv: configured.apiKeyEnv ?? fallback.apiKeyEnv,
      headers: configured.headers ?? {},
    };
  }
  return {
    baseUrl: fallback.baseUrl,
    apiKey: configured?.apiKey,
    apiKeyEnv: configured?.apiKeyEnv ?? fallback.apiKeyEnv,
    headers: configured?.headers ?? {},
  };
}

/** Fills every field the file leaves out. A provider without a base URL keeps the default endpoint. */
export function resolveSettings(file: SettingsFile): Settings {
  const providers: Record<ProviderName, ProviderEndpoint> = {
    openai: resolveProvider("openai", file),
    openrouter: resolveProvider("openrouter", file),
    requesty: resolveProvider("requesty", file),
    zai: resolveProvider("zai", file),
    generic: resolveProvider("generic", file),
  };

  return {
    memory: {
      enabled: file.memory?.enabled ?? true,
      bufferSize: file.memory?.bufferSize ?? 256,
      embeddingsEnabled: file.memory?.embeddingsEnabled ?? false,
      embeddingProvider: file.memory?.embeddingProvider ?? "",
      embeddingModel: file.memory?.embeddingModel?.trim() || "text-embedding-3-small",
    },
    model: {
      provider: file.model?.provider ?? "none",
      name: file.model?.name?.trim() ?? "",
    },
    providers,
    policy: {
      allowedTools: file.policy?.allowedTools ?? [...MEMORY_TOOL_NAMES],
    },
  };
}

export function parseSettings(raw: unknown): Settings {
  const parsed = settingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MemoryError("invalid_input", `invalid settings: ${z.prettifyError(parsed.error)}`, {
      code: "invalid_settings",
      cause: parsed.error,
    });
  }
  return resolveSettings(parsed.data);
}

export async function loadSettings(path: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) return defaultSettings();
    throw error;
  }
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (error) {
    throw new MemoryError("invalid_input", `invalid settings: ${path} is not valid JSON`, {
      code: "invalid_settings",
      cause: error,
    });
  }
  return parseSettings(doc);
}

export async function saveSettings(path: string, settings: Settings): Promise<void> {
  const validated = parseSettings(settings);
  await writeFileAtomicWithBackup(path, `${JSON.stringify(validated, null, 2)}\n`);
}

export interface ResolvedEndpoint {
  baseUrl: string;
  apiKey: string;
  headers: Record<string, string>;
}

/** Returns null when the provider has no base URL or no usable API key. */
export function resolveEndpoint(
  settings: Settings,
  provider: ProviderName,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedEndpoint | null {
  const endpoint = settings.providers[provider];
  const baseUrl = endpoint.baseUrl.trim().replace(/\/+$/, "");
  if (!baseUrl) return null;

  let apiKey = endpoint.apiKey?.trim() ?? "";
  if (!apiKey && endpoint.apiKeyEnv?.trim()) {
    apiKey = env[endpoint.apiKeyEnv.trim()]?.trim() ?? "";
  }
  if (!apiKey) return null;

  return { baseUrl, apiKey, headers: endpoint.headers };
}
