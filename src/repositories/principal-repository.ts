export interface Principal {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  jobTitle: string | null;
  phone: string | null;
  tenantId: string;
  isActive: boolean;
  isAdmin: boolean;
  hrEmployeeId: number | null;
  passwordUpdatedAt: Date;
  failedLoginAttempts: number;
  lockoutUntil: Date | null;
  resetTokenHash: string | null;
  resetTokenExpiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreatePrincipalInput {
  email: string;
  passwordHash: string;
  tenantId: string;
  fullName?: string | null;
  jobTitle?: string | null;
  phone?: string | null;
  isActive?: boolean;
  isAdmin?: boolean;
  hrEmployeeId?: number | null;
}

/**
 * Fields an administrator may change on an existing principal. Absent
 * properties are left untouched.
 */
export interface PrincipalChanges {
  email?: string;
  passwordHash?: string;
  fullName?: string | null;
  jobTitle?: string | null;
  phone?: string | null;
  tenantId?: string;
  isActive?: boolean;
  isAdmin?: boolean;
  hrEmployeeId?: number | null;
}

export interface ListPrincipalsInput {
  offset: number;
  limit: number;
}

export interface PrincipalRepository {
  createPrincipal(input: CreatePrincipalInput): Promise<Principal>;
  findPrincipalById(principalId: string): Promise<Principal | null>;
  findPrincipalByEmail(email: string): Promise<Principal | null>;
  listPrincipals(input: ListPrincipalsInput): Promise<Principal[]>;
  countPrincipalsInTenant(tenantId: string): Promise<number>;
  updatePrincipal(principalId: string, changes: PrincipalChanges, now: Date): Promise<Principal | null>;
  deletePrincipal(principalId: string): Promise<boolean>;
  recordFailedLogin(principalId: string, failedLoginAttempts: number, lockoutUntil: Date | null): Promise<void>;
  clearFailedLoginState(principalId: string): Promise<void>;
  setPasswordResetToken(principalId: string, tokenHash: string, expiresAt: Date): Promise<void>;
  /**
   * Replaces the password of the principal holding a live reset token with
   * `tokenHash` and clears that token in the same write.
   */
  resetPasswordWithToken(tokenHash: string, passwordHash: string, now: Date): Promise<Principal | null>;
}
