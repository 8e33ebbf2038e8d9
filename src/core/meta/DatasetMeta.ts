import {
  DatasetMetaJson,
  DatasetMetaJsonSchema,
  LicenseJson,
  SourceJson,
  parseJsonText,
  parseWithSchema,
} from "./schemas";

/** Where a dataset's data came from. */
export interface Source {
  name?: string;
  description?: string;
  url?: string;
  dateAccessed?: string;
  publicationDate?: string;
}

export interface License {
  name?: string;
  url?: string;
}

/**
 * The fields of a dataset's metadata index. Each of these is also exposed
 * as a property on an open `Dataset`.
 */
export interface DatasetMetaFields {
  namespace?: string;
  shortName?: string;
  title?: string;
  description?: string;
  sources: Source[];
  licenses: License[];
  isPublic: boolean;
  sourceChecksum?: string;
  version?: string;
}

/** Field names of {@link DatasetMetaFields}, in serialisation order. */
export const DATASET_META_FIELDS = [
  "namespace",
  "shortName",
  "title",
  "description",
  "sources",
  "licenses",
  "isPublic",
  "sourceChecksum",
  "version",
] as const satisfies readonly (keyof DatasetMetaFields)[];

function sourceFromJson(json: SourceJson): Source {
  return {
    name: json.name ?? undefined,
    description: json.description ?? undefined,
    url: json.url ?? undefined,
    dateAccessed: json.date_accessed ?? undefined,
    publicationDate: json.publication_date ?? undefined,
  };
}

function sourceToJson(source: Source): SourceJson {
  return {
    name: source.name,
    description: source.description,
    url: source.url,
    date_accessed: source.dateAccessed,
    publication_date: source.publicationDate,
  };
}

function licenseFromJson(json: LicenseJson): License {
  return { name: json.name ?? undefined, url: json.url ?? undefined };
}

/**
 * Metadata document stored in a dataset's `index.json`.
 *
 * A default-constructed instance is the empty document written by
 * `Dataset.createEmpty`. Two documents are equal when they serialise to the
 * same JSON.
 */
export class DatasetMeta implements DatasetMetaFields {
  namespace?: string;
  shortName?: string;
  title?: string;
  description?: string;
  sources: Source[];
  licenses: License[];
  isPublic: boolean;
  sourceChecksum?: string;
  version?: string;

  constructor(init: Partial<DatasetMetaFields> = {}) {
    this.namespace = init.namespace;
    this.shortName = init.shortName;
    this.title = init.title;
    this.description = init.description;
    this.sources = (init.sources ?? []).map((s) => ({ ...s }));
    this.licenses = (init.licenses ?? []).map((l) => ({ ...l }));
    this.isPublic = init.isPublic ?? true;
    this.sourceChecksum = init.sourceChecksum;
    this.version = init.version;
  }

  /**
   * Build a document from parsed JSON, validating it first.
   * @throws ValidationError if the document does not match the index schema
   */
  static fromJSON(raw: unknown): DatasetMeta {
    const json = parseWithSchema(DatasetMetaJsonSchema, raw, "dataset metadata");
    return new DatasetMeta({
      namespace: json.namespace ?? undefined,
      shortName: json.short_name ?? undefined,
      title: json.title ?? undefined,
      description: json.description ?? undefined,
      sources: json.sources.map(sourceFromJson),
      licenses: json.licenses.map(licenseFromJson),
      isPublic: json.is_public,
      sourceChecksum: json.source_checksum ?? undefined,
      version: json.version ?? undefined,
    });
  }

  static parse(text: string): DatasetMeta {
    return DatasetMeta.fromJSON(parseJsonText(text, "dataset metadata"));
  }

  toJSON(): DatasetMetaJson {
    return {
      namespace: this.namespace,
      short_name: this.shortName,
      title: this.title,
      description: this.description,
      sources: this.sources.map(sourceToJson),
      licenses: this.licenses.map((l) => ({ name: l.name, url: l.url })),
      is_public: this.isPublic,
      source_checksum: this.sourceChecksum,
      version: this.version,
    };
  }

  /** Serialised form written to disk; `undefined` fields are omitted. */
  stringify(): string {
    return `${JSON.stringify(this.toJSON(), null, 2)}\n`;
  }

  equals(other: DatasetMeta): boolean {
    return this.stringify() === other.stringify();
  }

  clone(): DatasetMeta {
    return new DatasetMeta(this);
  }
}
