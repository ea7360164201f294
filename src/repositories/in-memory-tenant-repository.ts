import { randomUUID } from 'node:crypto';

import { AppError } from '../errors/app-error.js';
import type {
  CreateTenantInput,
  ListTenantsInput,
  Tenant,
  TenantCredential,
  TenantRepository,
  UpsertTenantCredentialInput
} from './tenant-repository.js';

function cloneTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    createdAt: new Date(tenant.createdAt),
    updatedAt: new Date(tenant.updatedAt)
  };
}

function cloneCredential(credential: TenantCredential): TenantCredential {
  return {
    ...credential,
    createdAt: new Date(credential.createdAt),
    updatedAt: new Date(credential.updatedAt)
  };
}

function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

export class InMemoryTenantRepository implements TenantRepository {
  private readonly tenantsById = new Map<string, Tenant>();

  private readonly credentialsByTenantId = new Map<string, TenantCredential>();

  public createTenant(input: CreateTenantInput): Promise<Tenant> {
    const name = input.name.trim();
    for (const tenant of this.tenantsById.values()) {
      if (nameKey(tenant.name) === nameKey(name)) {
        return Promise.reject(new AppError(409, 'TENANT_NAME_IN_USE', 'A tenant with this name already exists.'));
      }
    }

    const now = new Date();
    const tenant: Tenant = {
      id: randomUUID(),
      name,
      isActive: input.isActive ?? true,
      createdAt: now,
      updatedAt: now
    };

    this.tenantsById.set(tenant.id, tenant);
    return Promise.resolve(cloneTenant(tenant));
  }

  public findTenantById(tenantId: string): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(tenantId);
    return Promise.resolve(tenant === undefined ? null : cloneTenant(tenant));
  }

  public findTenantByName(name: string): Promise<Tenant | null> {
    for (const tenant of this.tenantsById.values()) {
      if (nameKey(tenant.name) === nameKey(name)) {
        return Promise.resolve(cloneTenant(tenant));
      }
    }

    return Promise.resolve(null);
  }

  public listTenants(input: ListTenantsInput): Promise<Tenant[]> {
    const tenants = Array.from(this.tenantsById.values())
      .sort((left, right) => left.name.localeCompare(right.name))
      .slice(input.offset, input.offset + input.limit)
      .map(cloneTenant);

    return Promise.resolve(tenants);
  }

  public setTenantActive(tenantId: string, isActive: boolean): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(tenantId);
    if (tenant === undefined) {
      return Promise.resolve(null);
    }

    tenant.isActive = isActive;
    tenant.updatedAt = new Date();
    return Promise.resolve(cloneTenant(tenant));
  }

  public deleteTenant(tenantId: string): Promise<boolean> {
    this.credentialsByTenantId.delete(tenantId);
    return Promise.resolve(this.tenantsById.delete(tenantId));
  }

  public findCredential(tenantId: string): Promise<TenantCredential | null> {
    const credential = this.credentialsByTenantId.get(tenantId);
    return Promise.resolve(credential === undefined ? null : cloneCredential(credential));
  }

  public upsertCredential(input: UpsertTenantCredentialInput): Promise<TenantCredential> {
    const now = new Date();
    const existing = this.credentialsByTenantId.get(input.tenantId);
    const credential: TenantCredential = {
      tenantId: input.tenantId,
      baseUrl: input.baseUrl,
      accountId: input.accountId,
      encryptedApiKey: input.encryptedApiKey,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now
    };

    this.credentialsByTenantId.set(input.tenantId, credential);
    return Promise.resolve(cloneCredential(credential));
  }
}
