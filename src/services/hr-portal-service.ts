import type { RequestAuthContext } from '../auth/auth-context.js';
import type { DownstreamClient, DownstreamDownload, DownstreamTarget } from '../downstream/downstream-client.js';
import { AppError } from '../errors/app-error.js';
import type { PrincipalRepository } from '../repositories/principal-repository.js';
import type { TenantRepository } from '../repositories/tenant-repository.js';
import type { TenantCredentialStore } from './tenant-credential-store.js';

export interface UploadedFile {
  originalName: string;
  mimeType: string;
  content: Buffer;
}

export interface LeaveRequestInput {
  leaveTypeId: number;
  from: string;
  to: string;
  note?: string | null;
}

export interface ExpenseInput {
  description: string;
  amount: number;
  date: string;
  receipt: UploadedFile;
}

export interface EmployeeSearchInput {
  tenantId: string;
  term?: string;
  limit: number;
}

export interface ProfileView {
  email: string;
  full_name: string | null;
  job_title: string | null;
  phone: string | null;
  is_admin: boolean;
  hr_employee_id: number | null;
  address: string | null;
  department: string | null;
}

type JsonRecord = Record<string, unknown>;

const WIDGET_FALLBACK_STATUSES = [400, 403, 404, 500, 502, 503, 504];
const ATTENDANCE_FALLBACK_STATUSES = [403, 404, 500, 502, 503, 504];

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function notLinked(operation: string): AppError {
  return new AppError(400, 'HR_NOT_LINKED', `User not linked to HR system for ${operation}.`);
}

/**
 * Portal-facing HR operations. Each call resolves the caller's tenant
 * credential afresh and forwards to the tenant's HR backend; dashboard
 * widgets degrade to placeholder payloads instead of failing.
 */
export class HrPortalService {
  public constructor(
    private readonly principals: PrincipalRepository,
    private readonly tenants: TenantRepository,
    private readonly credentials: TenantCredentialStore,
    private readonly downstream: DownstreamClient
  ) {}

  public async getProfile(context: RequestAuthContext): Promise<ProfileView> {
    const principal = await this.principals.findPrincipalById(context.principalId);
    if (principal === null) {
      throw new AppError(404, 'PRINCIPAL_NOT_FOUND', 'User not found.');
    }

    const profile: ProfileView = {
      email: principal.email,
      full_name: principal.fullName,
      job_title: principal.jobTitle,
      phone: principal.phone,
      is_admin: principal.isAdmin,
      hr_employee_id: principal.hrEmployeeId,
      address: null,
      department: null
    };

    if (principal.hrEmployeeId === null) {
      return profile;
    }

    let employee: unknown;
    try {
      const target = await this.credentials.resolveTarget(principal.tenantId);
      employee = await this.downstream.requestJson(target, `/ess/api/employee/${principal.hrEmployeeId}`);
    } catch (error) {
      if (!(error instanceof AppError)) {
        throw error;
      }

      console.warn('profile_hr_lookup_failed', {
        principalId: principal.id,
        statusCode: error.statusCode,
        code: error.code
      });
      return profile;
    }

    if (!isRecord(employee)) {
      return profile;
    }

    return {
      ...profile,
      full_name: stringField(employee, 'name') ?? profile.full_name,
      job_title: stringField(employee, 'job_title') ?? profile.job_title,
      phone: stringField(employee, 'work_phone') ?? stringField(employee, 'mobile_phone') ?? profile.phone,
      address: stringField(employee, 'address'),
      department: stringField(employee, 'department')
    };
  }

  public async listLeaveTypes(context: RequestAuthContext): Promise<unknown> {
    const target = await this.credentials.resolveTarget(context.tenantId);
    return this.downstream.requestJson(target, '/ess/api/leave-types');
  }

  public async submitLeaveRequest(context: RequestAuthContext, input: LeaveRequestInput): Promise<unknown> {
    const employeeId = this.requireEmployee(context, 'leave request');
    const target = await this.credentials.resolveTarget(context.tenantId);

    return this.downstream.requestJson(target, '/ess/api/leave', {
      method: 'POST',
      body: {
        employee_id: employeeId,
        leave_type_id: input.leaveTypeId,
        from_date: input.from,
        to_date: input.to,
        note: input.note ?? null
      }
    });
  }

  public async getPendingLeavesCount(context: RequestAuthContext): Promise<unknown> {
    return this.withFallback(
      'pending_leaves_count',
      context,
      WIDGET_FALLBACK_STATUSES,
      async () => {
        const employeeId = this.requireEmployee(context, 'pending leaves');
        const target = await this.credentials.resolveTarget(context.tenantId);
        return this.downstream.requestJson(target, `/ess/api/leaves/pending-count/${employeeId}`);
      },
      () => ({ employee_id: context.hrEmployeeId ?? 0, pending_leave_count: 0 })
    );
  }

  public async getNextDayOff(context: RequestAuthContext): Promise<unknown> {
    return this.withFallback(
      'next_day_off',
      context,
      WIDGET_FALLBACK_STATUSES,
      async () => {
        const employeeId = this.requireEmployee(context, 'next day off');
        const target = await this.credentials.resolveTarget(context.tenantId);
        const body = await this.downstream.requestJson(target, `/ess/api/leaves/next-off/${employeeId}`);

        if (isRecord(body) && body.next_day_off !== undefined && body.next_day_off !== null && body.next_day_off !== false) {
          return body;
        }

        return {
          employee_id: isRecord(body) ? body.employee_id ?? employeeId : employeeId,
          message: 'No upcoming approved leave found.'
        };
      },
      () => ({ employee_id: context.hrEmployeeId ?? 0, message: 'Could not retrieve leave information.' })
    );
  }

  public async listPayslips(context: RequestAuthContext): Promise<unknown> {
    if (context.hrEmployeeId === null) {
      return [];
    }

    const target = await this.credentials.resolveTarget(context.tenantId);
    return this.downstream.requestJson(target, `/ess/api/payslips/${context.hrEmployeeId}`);
  }

  public async openPayslipDownload(context: RequestAuthContext, payslipId: number): Promise<DownstreamDownload> {
    const target = await this.credentials.resolveTarget(context.tenantId);
    return this.downstream.openDownload(target, `/ess/api/payslip/${payslipId}/download`);
  }

  public async submitExpense(context: RequestAuthContext, input: ExpenseInput): Promise<unknown> {
    const employeeId = this.requireEmployee(context, 'expense submission');
    const target = await this.credentials.resolveTarget(context.tenantId);

    return this.downstream.sendMultipart(target, '/ess/api/expenses', {
      fields: {
        employee_id: String(employeeId),
        description: input.description,
        amount: String(input.amount),
        date: input.date
      },
      files: [
        {
          field: 'receipt',
          filename: input.receipt.originalName,
          content: input.receipt.content,
          contentType: input.receipt.mimeType
        }
      ]
    });
  }

  public async listDocuments(context: RequestAuthContext): Promise<unknown> {
    if (context.hrEmployeeId === null) {
      return [];
    }

    const employeeId = context.hrEmployeeId;

    try {
      const target = await this.credentials.resolveTarget(context.tenantId);
      return await this.downstream.requestJson(target, `/ess/api/employee/${employeeId}/documents`);
    } catch (error) {
      if (error instanceof AppError && error.statusCode !== 401) {
        console.warn('documents_list_fallback', {
          principalId: context.principalId,
          statusCode: error.statusCode,
          code: error.code
        });
        return [];
      }

      throw error;
    }
  }

  public async uploadDocument(context: RequestAuthContext, documentType: string, file: UploadedFile): Promise<JsonRecord> {
    const employeeId = this.requireEmployee(context, 'document upload');
    const target = await this.credentials.resolveTarget(context.tenantId);

    const body = await this.downstream.sendMultipart(target, `/ess/api/employee/${employeeId}/document`, {
      fields: { document_type: documentType },
      files: [
        {
          field: 'file',
          filename: file.originalName,
          content: file.content,
          contentType: file.mimeType
        }
      ]
    });

    const record = isRecord(body) ? body : {};
    return {
      message: stringField(record, 'message') ?? 'Document processed by HR system.',
      document: record.attachment_id === undefined || record.attachment_id === null ? null : record
    };
  }

  public async openDocumentDownload(context: RequestAuthContext, documentId: number): Promise<DownstreamDownload> {
    const target = await this.credentials.resolveTarget(context.tenantId);
    return this.downstream.openDownload(target, `/ess/api/attachment/${documentId}/download`);
  }

  public async deleteDocument(context: RequestAuthContext, documentId: number): Promise<{ message: string }> {
    const target = await this.credentials.resolveTarget(context.tenantId);
    const body = await this.downstream.requestJson(target, `/ess/api/attachment/${documentId}`, { method: 'DELETE' });

    const message = isRecord(body) ? stringField(body, 'message') : null;
    return { message: message ?? 'Document deletion processed by HR system.' };
  }

  public async getAttendanceStatus(context: RequestAuthContext): Promise<unknown> {
    const employeeId = context.hrEmployeeId;
    if (employeeId === null) {
      return { status: 'unknown', message: 'Not linked to HR system.' };
    }

    return this.withFallback(
      'attendance_status',
      context,
      ATTENDANCE_FALLBACK_STATUSES,
      async () => {
        const target = await this.credentials.resolveTarget(context.tenantId);
        return this.downstream.requestJson(target, `/ess/api/attendance/status/${employeeId}`);
      },
      () => ({ status: 'error', message: 'Could not retrieve status from HR system.' })
    );
  }

  public async checkIn(context: RequestAuthContext): Promise<unknown> {
    return this.recordAttendance(context, 'check-in');
  }

  public async checkOut(context: RequestAuthContext): Promise<unknown> {
    return this.recordAttendance(context, 'check-out');
  }

  public async getTodayAttendanceLog(context: RequestAuthContext): Promise<unknown> {
    const employeeId = context.hrEmployeeId;
    if (employeeId === null) {
      return { message: 'Not linked to HR system.' };
    }

    return this.withFallback(
      'attendance_today_log',
      context,
      ATTENDANCE_FALLBACK_STATUSES,
      async () => {
        const target = await this.credentials.resolveTarget(context.tenantId);
        const log = await this.downstream.requestJson(target, `/ess/api/attendance/today/${employeeId}`);
        return { employee_id: employeeId, attendance_log: log };
      },
      () => ({ employee_id: employeeId, message: 'Could not retrieve attendance log.' })
    );
  }

  public async searchEmployees(input: EmployeeSearchInput): Promise<unknown> {
    const tenant = await this.tenants.findTenantById(input.tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    const target = await this.credentials.resolveTarget(input.tenantId);
    const params: Record<string, string | number> = { limit: input.limit };
    if (input.term !== undefined && input.term.length > 0) {
      params.term = input.term;
    }

    return this.downstream.requestJson(target, '/ess/api/admin/employees/search', { params });
  }

  private async recordAttendance(context: RequestAuthContext, action: 'check-in' | 'check-out'): Promise<unknown> {
    const employeeId = this.requireEmployee(context, action);
    const target: DownstreamTarget = await this.credentials.resolveTarget(context.tenantId);

    return this.downstream.sendMultipart(target, `/ess/api/attendance/${action}`, {
      fields: { employee_id: String(employeeId) },
      files: []
    });
  }

  private requireEmployee(context: RequestAuthContext, operation: string): number {
    if (context.hrEmployeeId === null) {
      throw notLinked(operation);
    }

    return context.hrEmployeeId;
  }

  private async withFallback<T, F>(
    widget: string,
    context: RequestAuthContext,
    statuses: readonly number[],
    operation: () => Promise<T>,
    fallback: () => F
  ): Promise<T | F> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AppError && statuses.includes(error.statusCode)) {
        console.warn('hr_widget_fallback', {
          widget,
          principalId: context.principalId,
          statusCode: error.statusCode,
          code: error.code
        });
        return fallback();
      }

      throw error;
    }
  }
}
