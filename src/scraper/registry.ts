/**
 * Extractor registry
 *
 * Maps a source's `crawler_type` to the factory building its extractor.
 */

import { logger } from '../utils/logger.js';
import type { SourceConfig } from '../types/index.js';
import type { Extractor, ExtractorFactory } from './types.js';
import { SICHUAN_FGW_TYPE, SichuanFgwExtractor } from './extractors/sichuan-fgw.js';
import {
  GENERIC_LISTING_TYPE,
  createGenericListingExtractor,
} from './extractors/generic-listing.js';

export class UnsupportedCrawlerTypeError extends Error {
  constructor(
    readonly crawlerType: string,
    readonly availableTypes: string[]
  ) {
    super(`unsupported crawler type: ${crawlerType}, available: [${availableTypes.join(', ')}]`);
    this.name = 'UnsupportedCrawlerTypeError';
  }
}

export interface ExtractorInfo {
  type: string;
  name: string;
  baseUrl: string;
}

export class ExtractorRegistry {
  private readonly factories = new Map<string, ExtractorFactory>();

  register(type: string, factory: ExtractorFactory): this {
    this.factories.set(type, factory);
    logger.debug({ type }, 'Registered crawler type');
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  availableTypes(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build the extractor for a source. Throws before any network activity
   * when the type is unknown.
   */
  create(type: string, source: SourceConfig): Extractor {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new UnsupportedCrawlerTypeError(type, this.availableTypes());
    }

    logger.debug({ type, source: source.key }, 'Creating extractor');
    return factory(source);
  }

  describe(type: string, source: SourceConfig): ExtractorInfo | null {
    if (!this.has(type)) {
      return null;
    }

    const extractor = this.create(type, source);
    return {
      type,
      name: extractor.getCrawlerName(),
      baseUrl: extractor.getBaseUrl(),
    };
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(SICHUAN_FGW_TYPE, () => new SichuanFgwExtractor())
    .register(GENERIC_LISTING_TYPE, createGenericListingExtractor);
}
