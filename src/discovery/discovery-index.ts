import type { Clock } from "../cache/cache-store.js";
import { MemoryCacheStore } from "../cache/memory-cache-store.js";
import type { PaginatingFetcher } from "../fetch/paginating-fetcher.js";
import type { RemoteRecord } from "../remote/remote-api.js";
import {
  QUICK_REFERENCE_BUCKETS,
  STATIC_CATEGORIES,
  TYPE_PRECEDENCE,
  type DiscoveryEntity,
  type DiscoveryEntityType,
  type QuickReferenceBucket,
} from "./catalog.js";

export type RankedEntity = DiscoveryEntity & { score: number };

export type EntityTypeFilter = DiscoveryEntityType | "any";

export type CatalogSnapshot = {
  entities: readonly DiscoveryEntity[];
  warnings: string[];
};

export type QuickReferenceItem = {
  type: DiscoveryEntityType;
  name: string;
  usageHint: string;
};

export type QuickReference = {
  generatedAt: string;
  buckets: Record<QuickReferenceBucket, QuickReferenceItem[]>;
  stages: QuickReferenceItem[];
  customFields: {
    count: number;
    examples: QuickReferenceItem[];
  };
  warnings: string[];
};

export type DiscoveryIndexOptions = {
  fetcher: Pick<PaginatingFetcher, "fetchUpTo">;
  categories?: readonly DiscoveryEntity[];
  lookupLimit?: number;
  sourceSampleSize?: number;
  quickReferenceTtlMs?: number;
  clock?: Clock;
};

export const SCORE_EXACT_NAME = 10;
export const SCORE_NAME_CONTAINS = 5;
export const SCORE_ALIAS_EXACT = 5;
export const SCORE_TOKEN_MATCH = 2;

const DEFAULT_FIND_LIMIT = 10;
const DEFAULT_LOOKUP_LIMIT = 500;
const DEFAULT_SOURCE_SAMPLE_SIZE = 100;
const DEFAULT_QUICK_REFERENCE_TTL_MS = 60 * 1000;
const QUICK_REFERENCE_KEY = "quick-reference";

type DynamicGroup = "stages" | "customFields" | "peopleSample";

export function scoreEntity(
  entity: DiscoveryEntity,
  keywords: Iterable<string>,
): number {
  const name = entity.name.toLowerCase();
  const aliases = (entity.aliases ?? []).map((alias) => alias.toLowerCase());
  const haystack = [name, ...aliases, (entity.description ?? "").toLowerCase()];
  let score = 0;

  for (const rawKeyword of keywords) {
    const keyword = rawKeyword.trim().toLowerCase();
    if (!keyword) {
      continue;
    }

    if (name === keyword) {
      score += SCORE_EXACT_NAME;
    } else if (name.includes(keyword)) {
      score += SCORE_NAME_CONTAINS;
    } else if (aliases.includes(keyword)) {
      score += SCORE_ALIAS_EXACT;
    } else {
      const tokens = keyword.split(/[\s_-]+/).filter((token) => token.length >= 3);
      if (tokens.some((token) => haystack.some((text) => text.includes(token)))) {
        score += SCORE_TOKEN_MATCH;
      }
    }
  }

  return score;
}

export function rankEntities(
  entities: readonly DiscoveryEntity[],
  keywords: Iterable<string>,
  limit: number = DEFAULT_FIND_LIMIT,
): RankedEntity[] {
  const keywordList = [...keywords];

  return entities
    .map((entity) => ({ ...entity, score: scoreEntity(entity, keywordList) }))
    .filter((entity) => entity.score > 0)
    .sort(
      (left, right) =>
        right.score - left.score ||
        TYPE_PRECEDENCE[left.type] - TYPE_PRECEDENCE[right.type] ||
        left.name.localeCompare(right.name),
    )
    .slice(0, Math.max(0, limit));
}

/**
 * Keyword search over the tenant's schema. Static categories are always known;
 * stages, custom fields and lead sources are loaded from the remote per call
 * through the paginating fetcher, so they share its cache and pacing.
 */
export class DiscoveryIndex {
  private readonly quickReferenceCache: MemoryCacheStore<QuickReference>;

  constructor(private readonly options: DiscoveryIndexOptions) {
    this.quickReferenceCache = new MemoryCacheStore<QuickReference>({
      maxEntries: 1,
      clock: options.clock,
    });
  }

  async find(
    keywords: Iterable<string>,
    entityTypeFilter: EntityTypeFilter = "any",
    limit: number = DEFAULT_FIND_LIMIT,
  ): Promise<RankedEntity[]> {
    const keywordList = [...new Set(keywords)];
    console.log(
      "[DiscoveryIndex:find] searching",
      keywordList.join(","),
      entityTypeFilter,
      limit,
    );

    const snapshot = await this.buildCatalog(entityTypeFilter);
    const results = rankEntities(snapshot.entities, keywordList, limit);

    console.log("[DiscoveryIndex:find] matches", results.length);
    return results;
  }

  async buildCatalog(entityTypeFilter: EntityTypeFilter = "any"): Promise<CatalogSnapshot> {
    const wants = (type: DiscoveryEntityType) =>
      entityTypeFilter === "any" || entityTypeFilter === type;

    const groups: DynamicGroup[] = [];
    if (wants("enumeratedValue")) {
      groups.push("stages");
    }
    if (wants("dynamicField")) {
      groups.push("customFields");
    }
    if (wants("sourceTag")) {
      groups.push("peopleSample");
    }

    const settled = await Promise.allSettled(
      groups.map((group) => this.loadGroup(group)),
    );

    const entities: DiscoveryEntity[] = wants("category")
      ? [...(this.options.categories ?? STATIC_CATEGORIES)]
      : [];
    const warnings: string[] = [];

    settled.forEach((result, index) => {
      const group = groups[index];
      if (result.status === "fulfilled") {
        entities.push(...result.value);
        return;
      }

      const reason =
        result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.warn("[DiscoveryIndex:buildCatalog] group unavailable", group, reason);
      warnings.push(`${group}: ${reason}`);
    });

    return {
      entities: Object.freeze(entities.filter((entity) => wants(entity.type))),
      warnings,
    };
  }

  async quickReference(): Promise<QuickReference> {
    const cached = this.quickReferenceCache.get(QUICK_REFERENCE_KEY);
    if (cached) {
      console.debug("[DiscoveryIndex:quickReference] served from cache");
      return copyQuickReference(cached);
    }

    const snapshot = await this.buildCatalog("any");
    const buckets: Record<QuickReferenceBucket, QuickReferenceItem[]> = {
      people: [],
      activity: [],
      lookup: [],
      other: [],
    };

    for (const entity of snapshot.entities) {
      buckets[bucketFor(entity)].push(toItem(entity));
    }

    const stages = snapshot.entities.filter(
      (entity) => entity.type === "enumeratedValue",
    );
    const fields = snapshot.entities.filter(
      (entity) => entity.type === "dynamicField",
    );

    const reference: QuickReference = {
      generatedAt: new Date((this.options.clock ?? Date.now)()).toISOString(),
      buckets,
      stages: stages.slice(0, 10).map(toItem),
      customFields: {
        count: fields.length,
        examples: fields.slice(0, 5).map(toItem),
      },
      warnings: snapshot.warnings,
    };

    this.quickReferenceCache.set(
      QUICK_REFERENCE_KEY,
      reference,
      this.options.quickReferenceTtlMs ?? DEFAULT_QUICK_REFERENCE_TTL_MS,
    );
    return copyQuickReference(reference);
  }

  private async loadGroup(group: DynamicGroup): Promise<DiscoveryEntity[]> {
    const lookupLimit = this.options.lookupLimit ?? DEFAULT_LOOKUP_LIMIT;

    switch (group) {
      case "stages": {
        const { records } = await this.options.fetcher.fetchUpTo("stages", {}, lookupLimit);
        return records.flatMap(toStageEntity);
      }
      case "customFields": {
        const { records } = await this.options.fetcher.fetchUpTo(
          "customFields",
          {},
          lookupLimit,
        );
        return records.flatMap(toFieldEntity);
      }
      case "peopleSample": {
        const { records } = await this.options.fetcher.fetchUpTo(
          "people",
          { sort: "-created" },
          this.options.sourceSampleSize ?? DEFAULT_SOURCE_SAMPLE_SIZE,
        );
        return toSourceTagEntities(records);
      }
    }
  }
}

function toStageEntity(record: RemoteRecord): DiscoveryEntity[] {
  const name = stringField(record, "name");
  const id = idField(record, "id");
  if (!name || id === undefined) {
    return [];
  }

  return [
    {
      type: "enumeratedValue",
      name,
      identifier: id,
      description: `Stage: ${name}`,
      usageHint: `Filter people or deals with stageId=${id}`,
    },
  ];
}

function toFieldEntity(record: RemoteRecord): DiscoveryEntity[] {
  const fieldName = stringField(record, "name");
  if (!fieldName) {
    return [];
  }
  const label = stringField(record, "label") || fieldName;
  const fieldType = stringField(record, "type") || "text";

  return [
    {
      type: "dynamicField",
      name: label,
      identifier: fieldName,
      aliases: label === fieldName ? [] : [fieldName],
      description: `Custom field: ${label} (${fieldType})`,
      usageHint: `Read or write customFields.${fieldName} on people`,
    },
  ];
}

function toSourceTagEntities(records: RemoteRecord[]): DiscoveryEntity[] {
  const sources = new Map<string | number, string>();
  const tags = new Set<string>();

  for (const record of records) {
    const source = stringField(record, "source");
    const sourceId = idField(record, "sourceId");
    if (source && sourceId !== undefined && !sources.has(sourceId)) {
      sources.set(sourceId, source);
    }

    const recordTags = record.tags;
    if (Array.isArray(recordTags)) {
      for (const tag of recordTags) {
        if (typeof tag === "string" && tag.trim()) {
          tags.add(tag.trim());
        }
      }
    }
  }

  const sourceEntities: DiscoveryEntity[] = [...sources].map(([id, name]) => ({
    type: "sourceTag",
    name,
    identifier: id,
    description: `Lead source: ${name}`,
    usageHint: `Filter people with sourceId=${id}`,
  }));
  const tagEntities: DiscoveryEntity[] = [...tags].map((tag) => ({
    type: "sourceTag",
    name: tag,
    identifier: tag,
    description: `Tag: ${tag}`,
    usageHint: `Filter people with tags=${tag}`,
  }));

  return [...sourceEntities, ...tagEntities];
}

function bucketFor(entity: DiscoveryEntity): QuickReferenceBucket {
  const name = entity.name.toLowerCase();
  const match = QUICK_REFERENCE_BUCKETS.find(({ terms }) =>
    terms.some((term) => name.includes(term)),
  );
  return match?.bucket ?? "other";
}

function toItem(entity: DiscoveryEntity): QuickReferenceItem {
  return { type: entity.type, name: entity.name, usageHint: entity.usageHint };
}

function stringField(record: RemoteRecord, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value.trim() : "";
}

function idField(record: RemoteRecord, key: string): string | number | undefined {
  const value = record[key];
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

// Callers get their own copy; the cached reference is shared across calls.
function copyQuickReference(reference: QuickReference): QuickReference {
  const copyItems = (items: QuickReferenceItem[]) => items.map((item) => ({ ...item }));
  return {
    generatedAt: reference.generatedAt,
    buckets: {
      people: copyItems(reference.buckets.people),
      activity: copyItems(reference.buckets.activity),
      lookup: copyItems(reference.buckets.lookup),
      other: copyItems(reference.buckets.other),
    },
    stages: copyItems(reference.stages),
    customFields: {
      count: reference.customFields.count,
      examples: copyItems(reference.customFields.examples),
    },
    warnings: [...reference.warnings],
  };
}
