/**
 * Secret record shapes shared by the resource and the data source.
 *
 * No type here carries the write-only value.
 */

/**
 * Persisted description of one secret in one vault.
 */
export interface SecretRecord {
  name: string;
  keyVaultId: string;
  /** Versioned secret URI */
  id: string;
  versionlessId: string;
  version: string;
  /** {keyVaultId}/secrets/{name}/versions/{version} */
  resourceId: string;
  /** {keyVaultId}/secrets/{name} */
  resourceVersionlessId: string;
  contentType?: string;
  /** RFC 3339, UTC */
  notBeforeDate?: string;
  /** RFC 3339, UTC */
  expirationDate?: string;
  tags: Record<string, string>;
}

/**
 * Resource state: the record plus the caller-controlled rotation counter.
 */
export interface SecretResourceState extends SecretRecord {
  valueWoVersion: number;
}

/**
 * Identity emitted on create/read and accepted by import.
 */
export interface SecretResourceIdentity {
  name: string;
  keyVaultId: string;
}

/**
 * Capability interface the record builder writes through.
 */
export interface SecretRecordSink {
  getKeyVaultId(): string;
  setId(id: string): void;
  setVersionlessId(id: string): void;
  setVersion(version: string): void;
  setResourceVersionlessId(id: string): void;
  setResourceId(id: string): void;
  setContentType(contentType: string): void;
  setNotBeforeDate(date: string): void;
  setExpirationDate(date: string): void;
  setTags(tags: Record<string, string>): void;
}

/**
 * Fields a model can be seeded with before vault data is applied.
 * Whatever the vault response omits keeps its seeded value.
 */
export type SecretModelSeed = Partial<
  Pick<
    SecretRecord,
    | "id"
    | "versionlessId"
    | "version"
    | "resourceId"
    | "resourceVersionlessId"
    | "contentType"
    | "notBeforeDate"
    | "expirationDate"
    | "tags"
  >
>;

export class SecretModel implements SecretRecordSink {
  id: string;
  versionlessId: string;
  version: string;
  resourceId: string;
  resourceVersionlessId: string;
  contentType?: string;
  notBeforeDate?: string;
  expirationDate?: string;
  tags: Record<string, string>;

  constructor(
    readonly name: string,
    readonly keyVaultId: string,
    seed: SecretModelSeed = {}
  ) {
    this.id = seed.id ?? "";
    this.versionlessId = seed.versionlessId ?? "";
    this.version = seed.version ?? "";
    this.resourceId = seed.resourceId ?? "";
    this.resourceVersionlessId = seed.resourceVersionlessId ?? "";
    this.contentType = seed.contentType;
    this.notBeforeDate = seed.notBeforeDate;
    this.expirationDate = seed.expirationDate;
    this.tags = { ...seed.tags };
  }

  /** Extra fields on the record (such as a rotation counter) are ignored. */
  static fromRecord(record: SecretRecord): SecretModel {
    return new SecretModel(record.name, record.keyVaultId, record);
  }

  getKeyVaultId(): string {
    return this.keyVaultId;
  }

  setId(id: string): void {
    this.id = id;
  }

  setVersionlessId(id: string): void {
    this.versionlessId = id;
  }

  setVersion(version: string): void {
    this.version = version;
  }

  setResourceVersionlessId(id: string): void {
    this.resourceVersionlessId = id;
  }

  setResourceId(id: string): void {
    this.resourceId = id;
  }

  setContentType(contentType: string): void {
    this.contentType = contentType;
  }

  setNotBeforeDate(date: string): void {
    this.notBeforeDate = date;
  }

  setExpirationDate(date: string): void {
    this.expirationDate = date;
  }

  setTags(tags: Record<string, string>): void {
    this.tags = { ...tags };
  }

  toRecord(): SecretRecord {
    const record: SecretRecord = {
      name: this.name,
      keyVaultId: this.keyVaultId,
      id: this.id,
      versionlessId: this.versionlessId,
      version: this.version,
      resourceId: this.resourceId,
      resourceVersionlessId: this.resourceVersionlessId,
      tags: { ...this.tags },
    };
    if (this.contentType !== undefined) record.contentType = this.contentType;
    if (this.notBeforeDate !== undefined) record.notBeforeDate = this.notBeforeDate;
    if (this.expirationDate !== undefined) record.expirationDate = this.expirationDate;
    return record;
  }

  toResourceState(valueWoVersion: number): SecretResourceState {
    return { ...this.toRecord(), valueWoVersion };
  }

  toIdentity(): SecretResourceIdentity {
    return { name: this.name, keyVaultId: this.keyVaultId };
  }
}
