/**
 * Feedback service
 * Feedback records under `/api/v1/feedback`, plus per-member listings.
 */

import { format as formatDate } from 'date-fns';
import type { FieldError } from '../client/errors';
import type { Params } from '../client/TransportClient';
import type { ListResponse } from '../types/common';
import {
  FEEDBACK_CATEGORIES,
  FEEDBACK_PRIORITIES,
  FEEDBACK_STATUSES,
  FEEDBACK_TYPES,
  FEEDBACK_VISIBILITIES,
  type Feedback,
  type FeedbackCreate,
  type FeedbackFilter,
  type FeedbackStats,
  type FeedbackUpdate,
} from '../types/feedback';
import {
  asRecord,
  decodeList,
  readBoolean,
  readCountMap,
  readEnum,
  readNumber,
  readOptionalDate,
  readOptionalString,
  readString,
  readStringArray,
} from './decode';
import { compactPayload, EntityService, listParam, type EntityServiceDeps, type ReadOptions } from './EntityService';
import { FieldErrors, isOneOf, sanitizeText } from './validation';

export const FEEDBACK_ENTITY = 'feedback';

const DAY_MS = 86_400_000;
const MIN_CONTENT_LENGTH = 10;

function formatRating(rating: number): string {
  return rating ? `${rating}/5` : 'N/A';
}

function isRating(value: number): boolean {
  return Number.isFinite(value) && value >= 1 && value <= 5;
}

export function decodeFeedback(raw: unknown, now: number = Date.now()): Feedback {
  const record = asRecord(raw, 'feedback');
  const createdAt = readOptionalDate(record, 'created_at');
  const rating = readNumber(record, 'rating', 0);

  return {
    id: readString(record, 'id'),
    member_id: readString(record, 'member_id'),
    organization_id: readOptionalString(record, 'organization_id') ?? '',
    provider_id: readOptionalString(record, 'provider_id'),
    content: readOptionalString(record, 'content') ?? '',
    feedback_type: readEnum(record, 'feedback_type', FEEDBACK_TYPES),
    rating,
    category: readEnum(record, 'category', FEEDBACK_CATEGORIES, 'constructive'),
    priority: readEnum(record, 'priority', FEEDBACK_PRIORITIES, 'medium'),
    visibility: readEnum(record, 'visibility', FEEDBACK_VISIBILITIES, 'private'),
    status: readEnum(record, 'status', FEEDBACK_STATUSES, 'submitted'),
    tags: readStringArray(record, 'tags'),
    created_at: createdAt ?? new Date(now),
    updated_at: readOptionalDate(record, 'updated_at') ?? createdAt ?? new Date(now),
    version: readNumber(record, 'version', 1),
    is_deleted: readBoolean(record, 'is_deleted', false),
    isRecent: createdAt ? now - createdAt.getTime() < DAY_MS : false,
    formattedRating: formatRating(rating),
  };
}

export function decodeFeedbackStats(raw: unknown): FeedbackStats {
  const record = asRecord(raw, 'feedback statistics');
  return {
    total_count: readNumber(record, 'total_count', 0),
    average_rating: readNumber(record, 'average_rating', 0),
    rating_distribution: readCountMap(record, 'rating_distribution'),
    feedback_type_counts: readCountMap(record, 'feedback_type_counts'),
    category_breakdown: readCountMap(record, 'category_breakdown'),
    priority_distribution: readCountMap(record, 'priority_distribution'),
    status_summary: readCountMap(record, 'status_summary'),
    recent_feedback_count: readNumber(record, 'recent_feedback_count', 0),
    member_participation_rate: readNumber(record, 'member_participation_rate', 0),
  };
}

/**
 * Checks shared by create and update; `partial` skips absent fields.
 */
function checkFields(input: FeedbackUpdate, errors: FieldErrors, partial: boolean): void {
  if (!partial || input.content !== undefined) {
    errors.check(
      sanitizeText(input.content ?? '').length >= MIN_CONTENT_LENGTH,
      'content',
      `Content must be at least ${MIN_CONTENT_LENGTH} characters long`,
    );
  }
  if (!partial || input.rating !== undefined) {
    errors.check(isRating(input.rating ?? 0), 'rating', 'Rating must be between 1 and 5');
  }
  if (input.feedback_type !== undefined) {
    errors.check(isOneOf(input.feedback_type, FEEDBACK_TYPES), 'feedback_type', 'Unknown feedback type');
  }
  if (input.category !== undefined) {
    errors.check(isOneOf(input.category, FEEDBACK_CATEGORIES), 'category', 'Unknown category');
  }
  if (input.priority !== undefined) {
    errors.check(isOneOf(input.priority, FEEDBACK_PRIORITIES), 'priority', 'Unknown priority');
  }
  if (input.visibility !== undefined) {
    errors.check(isOneOf(input.visibility, FEEDBACK_VISIBILITIES), 'visibility', 'Unknown visibility');
  }
  if (input.status !== undefined) {
    errors.check(isOneOf(input.status, FEEDBACK_STATUSES), 'status', 'Unknown status');
  }
}

function cleanTags(tags?: string[]): string[] | undefined {
  return tags?.map(sanitizeText).filter((tag) => tag !== '');
}

// ============================================================================
// Service
// ============================================================================

export class FeedbackService extends EntityService<
  Feedback,
  FeedbackCreate,
  FeedbackUpdate,
  FeedbackFilter,
  FeedbackStats
> {
  constructor(deps: EntityServiceDeps<Feedback>, apiPrefix = '/api/v1') {
    const root = `${apiPrefix}/feedback`;
    super(FEEDBACK_ENTITY, root, deps, [`${root}/member/`]);
  }

  /**
   * Feedback received by one member; read through the cache like `list`.
   */
  async listByMember(memberId: string, filter: FeedbackFilter = {}, options: ReadOptions = {}): Promise<ListResponse<Feedback>> {
    try {
      return await this.transport.get(`${this.root}/member/${encodeURIComponent(memberId)}`, {
        params: this.filterToParams({ ...filter, member_id: undefined }),
        decode: (raw) => decodeList(raw, (item) => this.decode(item)),
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
    } catch (error) {
      throw this.fail(error, 'listByMember');
    }
  }

  protected decode(raw: unknown): Feedback {
    return decodeFeedback(raw, this.now().getTime());
  }

  protected decodeStats(raw: unknown): FeedbackStats {
    return decodeFeedbackStats(raw);
  }

  protected validateCreate(input: FeedbackCreate): FieldError[] {
    const errors = new FieldErrors()
      .check(Boolean(input.member_id?.trim()), 'member_id', 'Member is required')
      .check(Boolean(input.organization_id?.trim()), 'organization_id', 'Organization is required')
      .check(Boolean(input.feedback_type), 'feedback_type', 'Feedback type is required');
    checkFields(input, errors, false);
    return errors.list();
  }

  protected validateUpdate(patch: FeedbackUpdate): FieldError[] {
    const errors = new FieldErrors();
    checkFields(patch, errors, true);
    return errors.list();
  }

  protected toCreatePayload(input: FeedbackCreate): Record<string, unknown> {
    return compactPayload({
      ...input,
      content: sanitizeText(input.content),
      tags: cleanTags(input.tags),
    });
  }

  protected toUpdatePayload(patch: FeedbackUpdate): Record<string, unknown> {
    return compactPayload({
      ...patch,
      content: patch.content === undefined ? undefined : sanitizeText(patch.content),
      tags: cleanTags(patch.tags),
    });
  }

  protected filterToParams(filter: FeedbackFilter): Params {
    return {
      page: filter.page,
      limit: filter.limit,
      sort_by: filter.sort_by,
      sort_direction: filter.sort_direction,
      member_id: filter.member_id,
      organization_id: filter.organization_id,
      provider_id: filter.provider_id,
      feedback_type: listParam(filter.feedback_type),
      category: listParam(filter.category),
      priority: listParam(filter.priority),
      status: listParam(filter.status),
      min_rating: filter.min_rating,
      max_rating: filter.max_rating,
      start_date: filter.start_date ? formatDate(filter.start_date, 'yyyy-MM-dd') : undefined,
      end_date: filter.end_date ? formatDate(filter.end_date, 'yyyy-MM-dd') : undefined,
      search: filter.search ? sanitizeText(filter.search) || undefined : undefined,
      tags: filter.tags?.length ? filter.tags.join(',') : undefined,
      exclude_deleted: filter.exclude_deleted,
    };
  }

  protected placeholder(input: FeedbackCreate, tempId: string, now: Date): Feedback {
    return {
      id: tempId,
      member_id: input.member_id,
      organization_id: input.organization_id,
      provider_id: input.provider_id,
      content: sanitizeText(input.content),
      feedback_type: input.feedback_type,
      rating: input.rating,
      category: input.category ?? 'constructive',
      priority: input.priority ?? 'medium',
      visibility: input.visibility ?? 'private',
      status: 'submitted',
      tags: cleanTags(input.tags) ?? [],
      created_at: now,
      updated_at: now,
      version: 0,
      is_deleted: false,
      isRecent: true,
      formattedRating: formatRating(input.rating),
    };
  }

  protected applyPatch(current: Feedback, patch: FeedbackUpdate): Feedback {
    const rating = patch.rating ?? current.rating;
    return {
      ...current,
      content: patch.content === undefined ? current.content : sanitizeText(patch.content),
      feedback_type: patch.feedback_type ?? current.feedback_type,
      rating,
      category: patch.category ?? current.category,
      priority: patch.priority ?? current.priority,
      visibility: patch.visibility ?? current.visibility,
      status: patch.status ?? current.status,
      tags: cleanTags(patch.tags) ?? current.tags,
      updated_at: this.now(),
      formattedRating: formatRating(rating),
    };
  }
}
