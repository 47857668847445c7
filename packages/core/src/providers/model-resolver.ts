import { FailscopeError, ErrorCode } from '../errors.js';
import { PROVIDER_CATALOG, parseProviderId } from './provider-catalog.js';
import type { ProviderCatalog } from './provider-catalog.js';
import type { ProviderId, ProviderModelEntry } from './provider-types.js';

export interface ResolvedModel {
  provider: ProviderId;
  entry: ProviderModelEntry;
}

/**
 * Maps a requested model name onto a catalog entry in two phases:
 * `resolve` never fails on an unknown name, `validate` does.
 */
export class ModelResolver {
  constructor(private readonly catalog: ProviderCatalog = PROVIDER_CATALOG) {}

  /**
   * Default when absent, exact id when known, canonical id when an alias
   * matches, otherwise the request unchanged.
   * @throws FailscopeError CONFIG_UNKNOWN_PROVIDER
   */
  resolve(provider: string, requestedModel?: string): string {
    const models = this.catalog.lookup(provider);
    const requested = requestedModel?.trim();
    if (!requested) {
      return this.catalog.defaultModel(provider);
    }
    if (models.some((entry) => entry.modelId === requested)) {
      return requested;
    }
    const aliased = models.find((entry) => entry.aliases?.includes(requested));
    return aliased ? aliased.modelId : requested;
  }

  /**
   * @throws FailscopeError CONFIG_UNSUPPORTED_MODEL when the model is not in the provider's catalog
   */
  validate(provider: string, modelId: string): ResolvedModel {
    const providerId = parseProviderId(provider);
    const entry = this.catalog.find(providerId, modelId);
    if (!entry) {
      const supported = this.catalog.lookup(providerId).map((e) => e.modelId);
      throw new FailscopeError(
        `Unsupported model '${modelId}' for provider '${providerId}'`,
        ErrorCode.CONFIG_UNSUPPORTED_MODEL,
        `Model "${modelId}" is not available for ${providerId}. Supported models: ${supported.join(', ')}.`,
        { provider: providerId, model: modelId }
      );
    }
    return { provider: providerId, entry };
  }

  resolveAndValidate(provider: string, requestedModel?: string): ResolvedModel {
    return this.validate(provider, this.resolve(provider, requestedModel));
  }
}
