/**
 * Member service
 * Member records under `/api/v1/members` and employment status changes.
 */

import { differenceInYears, format as formatDate } from 'date-fns';
import { DomainError, ErrorKind, type FieldError } from '../client/errors';
import type { RequestOptions, Params } from '../client/TransportClient';
import { beginOptimistic, patchChange } from '../state/optimistic';
import {
  EMPLOYMENT_STATUSES,
  EMPLOYMENT_TYPES,
  STATUS_TRANSITIONS,
  type EmploymentStatus,
  type Member,
  type MemberCreate,
  type MemberFilter,
  type MemberStats,
  type MemberStatusChange,
  type MemberUpdate,
} from '../types/member';
import {
  asRecord,
  isRecord,
  readBoolean,
  readCountMap,
  readEnum,
  readNumber,
  readOptionalDate,
  readOptionalNumber,
  readOptionalString,
  readString,
} from './decode';
import { compactPayload, EntityService, listParam, type EntityServiceDeps } from './EntityService';
import { FieldErrors, isEmail, isOneOf, isPhone, sanitizeText } from './validation';

export const MEMBER_ENTITY = 'member';

const MAX_SALARY = 10_000_000;

export function canTransition(from: EmploymentStatus, to: EmploymentStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

export function decodeMember(raw: unknown, now: Date = new Date()): Member {
  const record = asRecord(raw, 'member');
  const firstName = readString(record, 'first_name');
  const lastName = readString(record, 'last_name');
  const hireDate = readOptionalDate(record, 'hire_date');
  const createdAt = readOptionalDate(record, 'created_at') ?? now;

  return {
    id: readString(record, 'id'),
    organization_id: readOptionalString(record, 'organization_id'),
    employee_id: readOptionalString(record, 'employee_id'),
    first_name: firstName,
    last_name: lastName,
    email: readString(record, 'email'),
    phone: readOptionalString(record, 'phone'),
    job_title: readOptionalString(record, 'job_title'),
    department: readOptionalString(record, 'department'),
    manager_id: readOptionalString(record, 'manager_id'),
    employment_status: readEnum(record, 'employment_status', EMPLOYMENT_STATUSES, 'active'),
    employment_type: readEnum(record, 'employment_type', EMPLOYMENT_TYPES, 'full_time'),
    hire_date: hireDate,
    salary: readOptionalNumber(record, 'salary'),
    location: readOptionalString(record, 'location'),
    created_at: createdAt,
    updated_at: readOptionalDate(record, 'updated_at') ?? createdAt,
    version: readNumber(record, 'version', 1),
    is_deleted: readBoolean(record, 'is_deleted', false),
    full_name: `${firstName} ${lastName}`,
    tenure_years: hireDate ? differenceInYears(now, hireDate) : 0,
  };
}

export function decodeMemberStats(raw: unknown): MemberStats {
  const record = asRecord(raw, 'member statistics');
  return {
    total_count: readNumber(record, 'total_count', 0),
    active_count: readNumber(record, 'active_count', 0),
    department_distribution: readCountMap(record, 'department_distribution'),
    employment_type_breakdown: readCountMap(record, 'employment_type_breakdown'),
    employment_status_summary: readCountMap(record, 'employment_status_summary'),
    average_tenure: readNumber(record, 'average_tenure', 0),
    recent_hires_count: readNumber(record, 'recent_hires_count', 0),
    turnover_rate: readNumber(record, 'turnover_rate', 0),
  };
}

function checkFields(input: MemberUpdate, errors: FieldErrors, partial: boolean): void {
  if (!partial || input.email !== undefined) {
    errors.check(isEmail((input.email ?? '').trim()), 'email', 'Invalid email format');
  }
  if (!partial || input.first_name !== undefined) {
    errors.check(sanitizeText(input.first_name ?? '').length >= 2, 'first_name', 'First name must be at least 2 characters');
  }
  if (!partial || input.last_name !== undefined) {
    errors.check(sanitizeText(input.last_name ?? '').length >= 2, 'last_name', 'Last name must be at least 2 characters');
  }
  if (input.phone) {
    errors.check(isPhone(input.phone), 'phone', 'Invalid phone number format');
  }
  if (input.salary !== undefined) {
    errors
      .check(input.salary >= 0, 'salary', 'Salary cannot be negative')
      .check(input.salary <= MAX_SALARY, 'salary', 'Salary exceeds the allowed maximum');
  }
  if (input.employment_type !== undefined) {
    errors.check(isOneOf(input.employment_type, EMPLOYMENT_TYPES), 'employment_type', 'Unknown employment type');
  }
}

function toWire(input: MemberUpdate): Record<string, unknown> {
  return compactPayload({
    ...input,
    first_name: input.first_name === undefined ? undefined : sanitizeText(input.first_name),
    last_name: input.last_name === undefined ? undefined : sanitizeText(input.last_name),
    email: input.email?.trim().toLowerCase(),
    job_title: input.job_title === undefined ? undefined : sanitizeText(input.job_title),
    hire_date: input.hire_date ? formatDate(input.hire_date, 'yyyy-MM-dd') : undefined,
  });
}

// ============================================================================
// Service
// ============================================================================

export class MemberService extends EntityService<Member, MemberCreate, MemberUpdate, MemberFilter, MemberStats> {
  constructor(deps: EntityServiceDeps<Member>, apiPrefix = '/api/v1') {
    super(MEMBER_ENTITY, `${apiPrefix}/members`, deps);
  }

  /**
   * Checks the transition table against the current record before sending
   * `PUT /members/{id}/status`.
   */
  async updateStatus(id: string, change: MemberStatusChange, options: RequestOptions = {}): Promise<Member> {
    try {
      if (!isOneOf(change.status, EMPLOYMENT_STATUSES)) {
        throw new DomainError({
          kind: ErrorKind.VALIDATION,
          fieldErrors: [{ field: 'employment_status', message: 'Unknown employment status' }],
        });
      }
      const current = await this.getById(id, { signal: options.signal });
      const from = current.employment_status;
      if (!canTransition(from, change.status)) {
        throw new DomainError({
          kind: ErrorKind.VALIDATION,
          code: 'INVALID_STATUS_TRANSITION',
          message: `Cannot change status from ${from} to ${change.status}`,
          fieldErrors: [{ field: 'employment_status', message: `Cannot change status from ${from} to ${change.status}` }],
          details: { id, from, to: change.status },
        });
      }
    } catch (error) {
      throw this.fail(error, 'updateStatus');
    }

    const transaction = beginOptimistic(
      this.collection,
      patchChange<Member>(id, (held) => ({ ...held, employment_status: change.status })),
    );

    try {
      const saved = await this.transport.put(`${this.recordPath(id)}/status`, {
        ...options,
        body: compactPayload({
          new_status: change.status,
          reason: change.reason ? sanitizeText(change.reason) : undefined,
          effective_date: formatDate(change.effectiveDate ?? this.now(), 'yyyy-MM-dd'),
        }),
        decode: (raw) => this.decode(raw),
        invalidate: this.invalidation.prefixesFor(this.name, id),
        cacheAs: () => this.recordPath(id),
      });
      transaction.commit(saved);
      return saved;
    } catch (error) {
      transaction.rollback();
      throw this.fail(error, 'updateStatus');
    }
  }

  /**
   * True when no member uses the address yet.
   */
  async checkEmailAvailability(email: string): Promise<boolean> {
    try {
      return await this.transport.get(`${this.root}/check-email`, {
        params: { email: email.trim().toLowerCase() },
        decode: (raw) => isRecord(raw) && raw.available === true,
        skipCache: true,
      });
    } catch (error) {
      throw this.fail(error, 'checkEmailAvailability');
    }
  }

  protected decode(raw: unknown): Member {
    return decodeMember(raw, this.now());
  }

  protected decodeStats(raw: unknown): MemberStats {
    return decodeMemberStats(raw);
  }

  protected validateCreate(input: MemberCreate): FieldError[] {
    const errors = new FieldErrors();
    checkFields(input, errors, false);
    if (input.employment_status !== undefined) {
      errors.check(
        isOneOf(input.employment_status, EMPLOYMENT_STATUSES),
        'employment_status',
        'Unknown employment status',
      );
    }
    return errors.list();
  }

  protected validateUpdate(patch: MemberUpdate): FieldError[] {
    const errors = new FieldErrors();
    checkFields(patch, errors, true);
    return errors.list();
  }

  protected toCreatePayload(input: MemberCreate): Record<string, unknown> {
    return compactPayload({ ...toWire(input), employment_status: input.employment_status });
  }

  protected toUpdatePayload(patch: MemberUpdate): Record<string, unknown> {
    return toWire(patch);
  }

  protected filterToParams(filter: MemberFilter): Params {
    return {
      page: filter.page,
      limit: filter.limit,
      sort_by: filter.sort_by,
      sort_direction: filter.sort_direction,
      organization_id: filter.organization_id,
      department: filter.department,
      manager_id: filter.manager_id,
      employment_status: listParam(filter.employment_status),
      employment_type: listParam(filter.employment_type),
      hire_date_from: filter.hire_date_from ? formatDate(filter.hire_date_from, 'yyyy-MM-dd') : undefined,
      hire_date_to: filter.hire_date_to ? formatDate(filter.hire_date_to, 'yyyy-MM-dd') : undefined,
      search: filter.search ? sanitizeText(filter.search) || undefined : undefined,
    };
  }

  protected placeholder(input: MemberCreate, tempId: string, now: Date): Member {
    const firstName = sanitizeText(input.first_name);
    const lastName = sanitizeText(input.last_name);
    return {
      id: tempId,
      organization_id: input.organization_id,
      employee_id: input.employee_id,
      first_name: firstName,
      last_name: lastName,
      email: input.email.trim().toLowerCase(),
      phone: input.phone,
      job_title: input.job_title,
      department: input.department,
      manager_id: input.manager_id,
      employment_status: input.employment_status ?? 'active',
      employment_type: input.employment_type ?? 'full_time',
      hire_date: input.hire_date,
      salary: input.salary,
      location: input.location,
      created_at: now,
      updated_at: now,
      version: 0,
      is_deleted: false,
      full_name: `${firstName} ${lastName}`,
      tenure_years: input.hire_date ? differenceInYears(now, input.hire_date) : 0,
    };
  }

  protected applyPatch(current: Member, patch: MemberUpdate): Member {
    const firstName = patch.first_name === undefined ? current.first_name : sanitizeText(patch.first_name);
    const lastName = patch.last_name === undefined ? current.last_name : sanitizeText(patch.last_name);
    const hireDate = patch.hire_date ?? current.hire_date;
    const now = this.now();
    return {
      ...current,
      organization_id: patch.organization_id ?? current.organization_id,
      employee_id: patch.employee_id ?? current.employee_id,
      first_name: firstName,
      last_name: lastName,
      email: patch.email?.trim().toLowerCase() ?? current.email,
      phone: patch.phone ?? current.phone,
      job_title: patch.job_title ?? current.job_title,
      department: patch.department ?? current.department,
      manager_id: patch.manager_id ?? current.manager_id,
      employment_type: patch.employment_type ?? current.employment_type,
      hire_date: hireDate,
      salary: patch.salary ?? current.salary,
      location: patch.location ?? current.location,
      updated_at: now,
      full_name: `${firstName} ${lastName}`,
      tenure_years: hireDate ? differenceInYears(now, hireDate) : 0,
    };
  }
}
