import type { ListParams } from './common';

export const EMPLOYMENT_STATUSES = [
  'active',
  'inactive',
  'terminated',
  'on_leave',
  'probation',
  'suspended',
  'pending_start',
  'retired',
  'contract_ended',
  'transferred',
] as const;
export type EmploymentStatus = (typeof EMPLOYMENT_STATUSES)[number];

export const EMPLOYMENT_TYPES = [
  'full_time',
  'part_time',
  'contract',
  'intern',
  'consultant',
  'temporary',
  'seasonal',
  'volunteer',
  'freelance',
  'apprentice',
] as const;
export type EmploymentType = (typeof EMPLOYMENT_TYPES)[number];

/**
 * Allowed employment status changes; terminal states have none.
 */
export const STATUS_TRANSITIONS: Readonly<Record<EmploymentStatus, readonly EmploymentStatus[]>> = {
  pending_start: ['active', 'probation', 'terminated'],
  probation: ['active', 'terminated'],
  active: ['on_leave', 'suspended', 'inactive', 'terminated', 'retired', 'contract_ended', 'transferred'],
  on_leave: ['active', 'terminated'],
  suspended: ['active', 'terminated'],
  inactive: ['active', 'terminated'],
  terminated: [],
  retired: [],
  contract_ended: [],
  transferred: [],
};

export interface Member {
  id: string;
  organization_id?: string;
  employee_id?: string;
  first_name: string;
  last_name: string;
  email: string;
  phone?: string;
  job_title?: string;
  department?: string;
  manager_id?: string;
  employment_status: EmploymentStatus;
  employment_type: EmploymentType;
  hire_date?: Date;
  salary?: number;
  location?: string;
  created_at: Date;
  updated_at: Date;
  version: number;
  is_deleted: boolean;
  full_name: string;
  /** Whole years since hire_date, 0 without one */
  tenure_years: number;
}

export interface MemberCreate {
  first_name: string;
  last_name: string;
  email: string;
  organization_id?: string;
  employee_id?: string;
  phone?: string;
  job_title?: string;
  department?: string;
  manager_id?: string;
  employment_status?: EmploymentStatus;
  employment_type?: EmploymentType;
  hire_date?: Date;
  salary?: number;
  location?: string;
}

export type MemberUpdate = Partial<Omit<MemberCreate, 'employment_status'>>;

export interface MemberStatusChange {
  status: EmploymentStatus;
  reason?: string;
  effectiveDate?: Date;
}

export interface MemberFilter extends ListParams {
  organization_id?: string;
  department?: string;
  manager_id?: string;
  employment_status?: EmploymentStatus[];
  employment_type?: EmploymentType[];
  hire_date_from?: Date;
  hire_date_to?: Date;
  search?: string;
}

export interface MemberStats {
  total_count: number;
  active_count: number;
  department_distribution: Record<string, number>;
  employment_type_breakdown: Record<string, number>;
  employment_status_summary: Record<string, number>;
  average_tenure: number;
  recent_hires_count: number;
  turnover_rate: number;
}
