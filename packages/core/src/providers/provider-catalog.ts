import { FailscopeError, ErrorCode } from '../errors.js';
import { PROVIDER_IDS } from './provider-types.js';
import type { ProviderId, ProviderModelEntry } from './provider-types.js';
import { OPENAI_DEFAULT_MODEL, OPENAI_MODELS } from './openai/models.js';
import { ANTHROPIC_DEFAULT_MODEL, ANTHROPIC_MODELS } from './anthropic/models.js';
import { GEMINI_DEFAULT_MODEL, GEMINI_MODELS } from './gemini/models.js';

/** Read-only registry of supported provider/model combinations. */
export interface ProviderCatalog {
  /**
   * All model entries for a provider.
   * @throws FailscopeError CONFIG_UNKNOWN_PROVIDER
   */
  lookup(provider: string): readonly ProviderModelEntry[];

  /**
   * The model used when the caller names none.
   * @throws FailscopeError CONFIG_UNKNOWN_PROVIDER
   */
  defaultModel(provider: string): string;

  /** Exact (provider, modelId) match, or undefined. */
  find(provider: ProviderId, modelId: string): ProviderModelEntry | undefined;

  /** Every entry, grouped by provider in {@link PROVIDER_IDS} order. */
  entries(): readonly ProviderModelEntry[];
}

/**
 * Normalise a provider identifier (case-insensitive).
 * @throws FailscopeError CONFIG_UNKNOWN_PROVIDER
 */
export function parseProviderId(raw: string): ProviderId {
  const normalized = raw.trim().toLowerCase();
  const match = PROVIDER_IDS.find((id) => id === normalized);
  if (!match) {
    throw new FailscopeError(
      `Unsupported provider: ${raw}`,
      ErrorCode.CONFIG_UNKNOWN_PROVIDER,
      `Unsupported AI provider "${raw}". Supported providers: ${PROVIDER_IDS.join(', ')}.`,
      { provider: raw }
    );
  }
  return match;
}

/**
 * Build an immutable catalog. Fails on duplicate (provider, modelId) keys and on
 * defaults that do not name one of the provider's own entries.
 */
export function createProviderCatalog(
  entries: readonly ProviderModelEntry[],
  defaults: Record<ProviderId, string>
): ProviderCatalog {
  const byProvider = new Map<ProviderId, Map<string, ProviderModelEntry>>(
    PROVIDER_IDS.map((id) => [id, new Map<string, ProviderModelEntry>()])
  );

  for (const entry of entries) {
    const models = byProvider.get(entry.provider);
    if (!models) continue;
    if (models.has(entry.modelId)) {
      throw new FailscopeError(
        `Duplicate catalog entry: ${entry.provider}/${entry.modelId}`,
        ErrorCode.CONFIG_INVALID,
        undefined,
        { provider: entry.provider, model: entry.modelId }
      );
    }
    models.set(
      entry.modelId,
      Object.freeze({
        ...entry,
        ...(entry.aliases ? { aliases: Object.freeze([...entry.aliases]) } : {}),
      })
    );
  }

  for (const id of PROVIDER_IDS) {
    if (!byProvider.get(id)?.has(defaults[id])) {
      throw new FailscopeError(
        `Default model ${defaults[id]} is not in the ${id} catalog`,
        ErrorCode.CONFIG_INVALID,
        undefined,
        { provider: id, model: defaults[id] }
      );
    }
  }

  const frozenLists = new Map<ProviderId, readonly ProviderModelEntry[]>(
    PROVIDER_IDS.map((id) => [id, Object.freeze([...(byProvider.get(id)?.values() ?? [])])])
  );
  const allEntries = Object.freeze(PROVIDER_IDS.flatMap((id) => frozenLists.get(id) ?? []));
  const frozenDefaults = Object.freeze({ ...defaults });

  return Object.freeze({
    lookup(provider: string): readonly ProviderModelEntry[] {
      return frozenLists.get(parseProviderId(provider)) ?? [];
    },
    defaultModel(provider: string): string {
      return frozenDefaults[parseProviderId(provider)];
    },
    find(provider: ProviderId, modelId: string): ProviderModelEntry | undefined {
      return byProvider.get(provider)?.get(modelId);
    },
    entries(): readonly ProviderModelEntry[] {
      return allEntries;
    },
  });
}

/** Process-wide catalog, built once at import. */
export const PROVIDER_CATALOG: ProviderCatalog = createProviderCatalog(
  [...OPENAI_MODELS, ...ANTHROPIC_MODELS, ...GEMINI_MODELS],
  {
    openai: OPENAI_DEFAULT_MODEL,
    anthropic: ANTHROPIC_DEFAULT_MODEL,
    gemini: GEMINI_DEFAULT_MODEL,
  }
);
