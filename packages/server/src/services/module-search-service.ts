/**
 * Module Search Service
 *
 * Candidates are the latest published non-beta version of each module
 * provider. Scoring and ordering come from core's `rankCandidates`.
 */

import {
  listSearchCandidates,
  rankCandidates,
  type DatabaseClient,
  type DomainConfig,
  type SearchCandidateFilters,
  type SearchCandidateRow,
  type SearchFields,
} from '@terrashelf/core';
import type { ModuleListResponse } from '@terrashelf/protocol';
import { latestPerModuleProvider, paginationMeta, type ModuleRegistryService } from './module-registry-service.js';

export interface ModuleSearchQuery {
  q: string;
  offset: number;
  limit: number;
  namespaces?: readonly string[];
  providers?: readonly string[];
  verified?: boolean;
  /** Only trusted namespaces */
  trustedNamespaces?: boolean;
  /** Only namespaces that are not trusted */
  contributed?: boolean;
}

export function searchFieldsOf(row: SearchCandidateRow): SearchFields {
  return {
    namespace: row.namespace.name,
    module: row.moduleProvider.module_name,
    provider: row.moduleProvider.provider_name,
    description: row.moduleVersion.description,
    owner: row.moduleVersion.owner,
    publishedAt: row.moduleVersion.published_at,
  };
}

export class ModuleSearchService {
  constructor(
    private readonly db: DatabaseClient,
    private readonly domain: DomainConfig,
    private readonly registry: ModuleRegistryService
  ) {}

  private filtersFor(query: ModuleSearchQuery): SearchCandidateFilters {
    const filters: SearchCandidateFilters = {};
    if (query.namespaces && query.namespaces.length > 0) filters.namespaces = query.namespaces;
    if (query.providers && query.providers.length > 0) filters.providers = query.providers;

    // Both flags together select everything
    const trusted = query.trustedNamespaces === true;
    const contributed = query.contributed === true;
    if (trusted !== contributed) {
      filters.trusted = { namespaces: this.domain.trustedNamespaces, include: trusted };
    }
    return filters;
  }

  search(query: ModuleSearchQuery): ModuleListResponse {
    let candidates = latestPerModuleProvider(listSearchCandidates(this.db, this.filtersFor(query)));
    // Verification also comes from VERIFIED_MODULE_NAMESPACES, so filter after loading
    if (query.verified !== undefined) {
      const wanted = query.verified;
      candidates = candidates.filter(row => this.registry.isVerified(row.namespace, row.moduleProvider) === wanted);
    }
    const ranked = rankCandidates(candidates, query.q, searchFieldsOf);
    const page = ranked.slice(query.offset, query.offset + query.limit).map(result => result.item);

    return {
      meta: paginationMeta(query.offset, query.limit, ranked.length),
      modules: this.registry.summarizeAll(page),
    };
  }
}
