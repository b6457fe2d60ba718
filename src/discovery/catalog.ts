export type DiscoveryEntityType =
  | "category"
  | "enumeratedValue"
  | "dynamicField"
  | "sourceTag";

export type DiscoveryEntity = Readonly<{
  type: DiscoveryEntityType;
  name: string;
  identifier: string | number;
  usageHint: string;
  description?: string;
  aliases?: readonly string[];
}>;

// Tie-break order when two entities score the same.
export const TYPE_PRECEDENCE: Record<DiscoveryEntityType, number> = {
  category: 0,
  enumeratedValue: 1,
  dynamicField: 2,
  sourceTag: 3,
};

type CategoryDefinition = {
  name: string;
  description: string;
  keywords: string[];
  filters: string[];
};

const CATEGORY_DEFINITIONS: CategoryDefinition[] = [
  {
    name: "people",
    description: "Contacts and leads in the tenant database",
    keywords: ["contact", "lead", "person", "client", "prospect", "customer"],
    filters: ["stageId", "assignedUserId", "sourceId", "tags", "created", "updated"],
  },
  {
    name: "deals",
    description: "Transactions moving through a pipeline",
    keywords: ["deal", "transaction", "sale", "listing", "contract"],
    filters: ["personId", "pipelineId", "stageId"],
  },
  {
    name: "tasks",
    description: "Follow-up tasks assigned to team members",
    keywords: ["task", "todo", "action", "followup", "reminder"],
    filters: ["personId", "assignedTo", "status"],
  },
  {
    name: "events",
    description: "Activity history and inbound interactions",
    keywords: ["event", "activity", "interaction", "history", "log"],
    filters: ["personId", "type", "created"],
  },
  {
    name: "calls",
    description: "Phone call records",
    keywords: ["call", "phone", "conversation", "dial"],
    filters: ["personId", "created"],
  },
  {
    name: "notes",
    description: "Notes and comments about contacts",
    keywords: ["note", "comment", "memo", "annotation"],
    filters: ["personId"],
  },
  {
    name: "appointments",
    description: "Scheduled appointments and meetings",
    keywords: ["appointment", "meeting", "showing", "schedule"],
    filters: ["personId", "startDate", "endDate"],
  },
  {
    name: "stages",
    description: "Lifecycle stages a contact can be in",
    keywords: ["stage", "status", "lifecycle"],
    filters: [],
  },
  {
    name: "customFields",
    description: "Tenant-defined fields attached to contacts",
    keywords: ["custom", "field", "attribute"],
    filters: [],
  },
];

export const STATIC_CATEGORIES: readonly DiscoveryEntity[] = CATEGORY_DEFINITIONS.map(
  (definition) => ({
    type: "category",
    name: definition.name,
    identifier: definition.name,
    description: definition.description,
    aliases: definition.keywords,
    usageHint:
      definition.filters.length > 0
        ? `GET /records/${definition.name} with filters ${definition.filters.join(", ")}`
        : `GET /records/${definition.name}`,
  }),
);

export type QuickReferenceBucket = "people" | "activity" | "lookup" | "other";

export const QUICK_REFERENCE_BUCKETS: ReadonlyArray<{
  bucket: Exclude<QuickReferenceBucket, "other">;
  terms: readonly string[];
}> = [
  {
    bucket: "people",
    terms: ["people", "person", "contact", "lead", "client", "user", "agent", "buyer", "seller"],
  },
  {
    bucket: "activity",
    terms: ["event", "call", "note", "appointment", "task", "text", "email", "activity", "showing"],
  },
  {
    bucket: "lookup",
    terms: ["stage", "pipeline", "source", "field", "tag", "group", "type", "status"],
  },
];
