import type { ConnectorCallContext } from './inbound-guard.js';

export interface HrFile {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface HrUpload {
  originalName: string;
  mimeType: string;
  content: Buffer;
}

export interface LeaveSubmission {
  employeeId: number;
  leaveTypeId: number;
  fromDate: string;
  toDate: string;
  note: string | null;
}

export interface ExpenseSubmission {
  employeeId: number;
  description: string;
  amount: number;
  date: string;
  receipt: HrUpload | null;
}

export interface EmployeeSearchQuery {
  term: string | null;
  limit: number;
}

/**
 * The HR system behind the connector. Implementations own the business
 * rules; they signal expected failures (missing records, permission
 * problems, validation) by throwing `AppError`.
 */
export interface HrBackend {
  getEmployee(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  listLeaveTypes(context: ConnectorCallContext): Promise<unknown>;
  submitLeave(context: ConnectorCallContext, submission: LeaveSubmission): Promise<unknown>;
  countPendingLeaves(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  getNextDayOff(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  listPayslips(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  getPayslipPdf(context: ConnectorCallContext, payslipId: number): Promise<HrFile>;
  submitExpense(context: ConnectorCallContext, submission: ExpenseSubmission): Promise<unknown>;
  getTodayAttendance(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  getAttendanceStatus(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  checkIn(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  checkOut(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  searchEmployees(context: ConnectorCallContext, query: EmployeeSearchQuery): Promise<unknown>;
  uploadEmployeeDocument(
    context: ConnectorCallContext,
    employeeId: number,
    documentType: string,
    file: HrUpload
  ): Promise<unknown>;
  listEmployeeDocuments(context: ConnectorCallContext, employeeId: number): Promise<unknown>;
  getAttachment(context: ConnectorCallContext, attachmentId: number): Promise<HrFile>;
  deleteAttachment(context: ConnectorCallContext, attachmentId: number): Promise<unknown>;
}
