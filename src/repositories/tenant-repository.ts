export interface Tenant {
  id: string;
  name: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Connection details for a tenant's HR backend. `encryptedApiKey` is vault
 * ciphertext and is the only form in which the key is persisted.
 */
export interface TenantCredential {
  tenantId: string;
  baseUrl: string;
  accountId: string;
  encryptedApiKey: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateTenantInput {
  name: string;
  isActive?: boolean;
}

export interface UpsertTenantCredentialInput {
  tenantId: string;
  baseUrl: string;
  accountId: string;
  encryptedApiKey: string;
}

export interface ListTenantsInput {
  offset: number;
  limit: number;
}

export interface TenantRepository {
  createTenant(input: CreateTenantInput): Promise<Tenant>;
  findTenantById(tenantId: string): Promise<Tenant | null>;
  findTenantByName(name: string): Promise<Tenant | null>;
  listTenants(input: ListTenantsInput): Promise<Tenant[]>;
  setTenantActive(tenantId: string, isActive: boolean): Promise<Tenant | null>;
  /** Removes the tenant together with its credential. */
  deleteTenant(tenantId: string): Promise<boolean>;
  findCredential(tenantId: string): Promise<TenantCredential | null>;
  upsertCredential(input: UpsertTenantCredentialInput): Promise<TenantCredential>;
}
