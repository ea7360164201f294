import type { DownstreamTarget } from '../downstream/downstream-client.js';
import { AppError } from '../errors/app-error.js';
import type { TenantCredential, TenantRepository } from '../repositories/tenant-repository.js';
import type { CredentialVault } from '../security/credential-vault.js';

export interface TenantCredentialInput {
  baseUrl: string;
  accountId: string;
  apiKey: string;
}

/** Admin-facing view of a tenant's HR connection; never carries the key. */
export interface TenantCredentialSummary {
  tenantId: string;
  baseUrl: string;
  accountId: string;
  hasApiKey: boolean;
  updatedAt: Date;
}

function summarize(credential: TenantCredential): TenantCredentialSummary {
  return {
    tenantId: credential.tenantId,
    baseUrl: credential.baseUrl,
    accountId: credential.accountId,
    hasApiKey: credential.encryptedApiKey.length > 0,
    updatedAt: credential.updatedAt
  };
}

export class TenantCredentialStore {
  public constructor(
    private readonly tenants: TenantRepository,
    private readonly vault: CredentialVault
  ) {}

  public async get(tenantId: string): Promise<TenantCredential> {
    const credential = await this.tenants.findCredential(tenantId);
    if (credential === null) {
      throw new AppError(503, 'HR_NOT_CONFIGURED', 'HR system is not configured for your organization.');
    }

    return credential;
  }

  public async upsert(tenantId: string, input: TenantCredentialInput): Promise<TenantCredentialSummary> {
    const tenant = await this.tenants.findTenantById(tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    const credential = await this.tenants.upsertCredential({
      tenantId,
      baseUrl: input.baseUrl.trim().replace(/\/+$/, ''),
      accountId: input.accountId.trim(),
      encryptedApiKey: this.vault.encrypt(input.apiKey)
    });

    console.log('tenant_credential_saved', { tenantId, baseUrl: credential.baseUrl });
    return summarize(credential);
  }

  public async resolveTarget(tenantId: string): Promise<DownstreamTarget> {
    const credential = await this.get(tenantId);
    const decrypted = this.vault.decrypt(credential.encryptedApiKey);

    if (!decrypted.ok) {
      console.error('tenant_credential_unusable', {
        tenantId,
        reason: decrypted.error.code
      });
      throw new AppError(500, 'CREDENTIAL_UNUSABLE', 'Stored HR credentials could not be decrypted.');
    }

    return {
      baseUrl: credential.baseUrl,
      serviceToken: decrypted.value
    };
  }

  public async describe(tenantId: string): Promise<TenantCredentialSummary | null> {
    const credential = await this.tenants.findCredential(tenantId);
    return credential === null ? null : summarize(credential);
  }
}
