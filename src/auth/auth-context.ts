export const RESOURCE_KINDS = [
  'hr.employee',
  'hr.leave.type',
  'hr.leave',
  'hr.payslip',
  'hr.expense',
  'hr.attendance',
  'ir.attachment'
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export function isResourceKind(value: string): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}

/** Portal principal resolved from a verified access token. */
export interface RequestAuthContext {
  principalId: string;
  tenantId: string;
  email: string;
  isAdmin: boolean;
  hrEmployeeId: number | null;
}

/**
 * An empty scope grants every kind. Routes that declare no kind are open to
 * any valid token.
 */
export function scopePermits(scope: readonly ResourceKind[], kind: ResourceKind | null): boolean {
  if (kind === null || scope.length === 0) {
    return true;
  }

  return scope.includes(kind);
}
