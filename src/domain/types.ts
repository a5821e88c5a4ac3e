export type WorkflowStatus = 'PENDING' | 'APPROVED' | 'REJECTED' | 'WITHDRAWN';

export type WorkflowPriority = 'NORMAL' | 'HIGH' | 'URGENT';

export type StepAction = 'PENDING' | 'APPROVED' | 'REJECTED' | 'WITHDRAWN' | 'CANCELLED' | 'SKIPPED';

export type DocumentWorkflowStatus = 'DRAFT' | 'PENDING_APPROVAL' | 'APPROVED' | 'REJECTED';

export type ApprovalMode = 'ALL' | 'ANY';

export type ErrorCode = 'VALIDATION_ERROR' | 'FORBIDDEN' | 'CONFLICT' | 'NOT_FOUND' | 'STORAGE_ERROR';

export type NotificationType = 'APPROVAL_REQUEST' | 'APPROVED' | 'REJECTED' | 'WITHDRAWN' | 'REASSIGNED';

export type AuditAction = 'SUBMITTED_FOR_APPROVAL' | 'APPROVED' | 'STEP_APPROVED' | 'REJECTED' | 'WITHDRAWN' | 'REASSIGNED';

export interface DocumentKey {
  documentNumber: string;
  companyCode: string;
}

export interface ApprovalLevel {
  id: number;
  companyCode: string;
  levelName: string;
  levelOrder: number;
  thresholdLow: number;
  thresholdHigh: number | null;
  timeLimitHours: number;
  approvalMode: ApprovalMode;
  isActive: boolean;
}

export interface Approver {
  username: string;
  fullName: string;
  email: string | null;
  delegatedFrom: string | null;
}

export interface Delegation {
  userId: string;
  approvalLevelId: number;
  companyCode: string | null;
  delegatedTo: string;
  startDate: string | null;
  endDate: string | null;
}

export interface JournalDocument extends DocumentKey {
  reference: string | null;
  postingDate: string | null;
  currencyCode: string | null;
  createdBy: string;
  workflowStatus: DocumentWorkflowStatus;
  submittedAt: string | null;
  submittedBy: string | null;
}

export interface JournalLine {
  lineItem: number;
  glAccount: string | null;
  debitAmount: number;
  creditAmount: number;
}

export interface WorkflowInstance extends DocumentKey {
  id: number;
  status: WorkflowStatus;
  priority: WorkflowPriority;
  approvalLevelId: number;
  createdBy: string;
  assignedTo: string | null;
  createdAt: string;
  submittedAt: string;
  completedAt: string | null;
  approvedAt: string | null;
  approvedBy: string | null;
}

export interface ApprovalStep {
  id: number;
  workflowInstanceId: number;
  approvalLevelId: number;
  assignedTo: string;
  delegatedFrom: string | null;
  action: StepAction;
  actionBy: string | null;
  actionAt: string | null;
  comments: string | null;
  createdAt: string;
}

export interface AuditLogEntry extends DocumentKey {
  id: number;
  action: AuditAction;
  performedBy: string;
  oldStatus: DocumentWorkflowStatus | null;
  newStatus: DocumentWorkflowStatus | null;
  comments: string | null;
  timestamp: string;
}

export interface Notification {
  id: number;
  recipient: string;
  notificationType: NotificationType;
  subject: string;
  message: string;
  workflowInstanceId: number;
  createdAt: string;
  isRead: boolean;
}

export type NotificationInput = Omit<Notification, 'id' | 'createdAt' | 'isRead'>;

export interface PendingApproval extends DocumentKey {
  workflowId: number;
  stepId: number;
  assignedTo: string;
  delegatedFrom: string | null;
  reference: string | null;
  postingDate: string | null;
  currencyCode: string | null;
  createdBy: string;
  priority: WorkflowPriority;
  approvalLevel: string;
  totalAmount: number;
  submittedAt: string;
  dueAt: string;
  isOverdue: boolean;
}

export interface WorkflowSummary extends DocumentKey {
  workflowId: number;
  status: WorkflowStatus;
  priority: WorkflowPriority;
  approvalLevel: string | null;
  createdBy: string;
  assignedTo: string | null;
  createdAt: string;
  submittedAt: string;
  completedAt: string | null;
  approvedAt: string | null;
  approvedBy: string | null;
  totalAmount: number;
  isOverdue: boolean;
}

export interface WorkflowDetail {
  instance: WorkflowInstance;
  steps: ApprovalStep[];
}

export interface WorkflowStatistics {
  totalWorkflows: number;
  pendingCount: number;
  approvedCount: number;
  rejectedCount: number;
  withdrawnCount: number;
  overdueCount: number;
  avgCompletionHours: number;
  levelBreakdown: Array<{ level: string; count: number }>;
  topApprovers: Array<{ approver: string; count: number }>;
}

export interface AuditTrailFilter {
  documentNumber?: string;
  companyCode?: string;
  performedBy?: string;
  daysBack?: number;
}

export interface SubmitOptions {
  comments?: string | null;
  priority?: WorkflowPriority;
}

export type WorkflowResult =
  | { success: true; message: string; workflowId: number; status: WorkflowStatus }
  | { success: false; message: string; code: ErrorCode };
