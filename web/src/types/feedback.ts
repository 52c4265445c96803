import type { ListParams } from './common';

export const FEEDBACK_TYPES = [
  'performance',
  'behavioral',
  'technical',
  'cultural_fit',
  'interview',
  'peer_review',
  'manager_review',
  'self_assessment',
  'exit_interview',
  'onboarding',
  'project_review',
  'skill_assessment',
] as const;
export type FeedbackType = (typeof FEEDBACK_TYPES)[number];

export const FEEDBACK_STATUSES = [
  'draft',
  'submitted',
  'under_review',
  'reviewed',
  'acknowledged',
  'published',
  'archived',
  'deleted',
  'pending_approval',
  'rejected',
] as const;
export type FeedbackStatus = (typeof FEEDBACK_STATUSES)[number];

export const FEEDBACK_PRIORITIES = ['low', 'medium', 'high', 'critical', 'urgent'] as const;
export type FeedbackPriority = (typeof FEEDBACK_PRIORITIES)[number];

export const FEEDBACK_VISIBILITIES = [
  'private',
  'manager_only',
  'team_visible',
  'department_visible',
  'organization_wide',
  'public',
] as const;
export type FeedbackVisibility = (typeof FEEDBACK_VISIBILITIES)[number];

export const FEEDBACK_CATEGORIES = [
  'positive',
  'constructive',
  'developmental',
  'recognition',
  'improvement_needed',
  'goal_setting',
  'performance_issue',
  'achievement',
] as const;
export type FeedbackCategory = (typeof FEEDBACK_CATEGORIES)[number];

export interface Feedback {
  id: string;
  member_id: string;
  organization_id: string;
  provider_id?: string;
  content: string;
  feedback_type: FeedbackType;
  /** 1-5 */
  rating: number;
  category: FeedbackCategory;
  priority: FeedbackPriority;
  visibility: FeedbackVisibility;
  status: FeedbackStatus;
  tags: string[];
  created_at: Date;
  updated_at: Date;
  version: number;
  is_deleted: boolean;
  /** Created within the last 24 hours */
  isRecent: boolean;
  /** e.g. `4/5`, or `N/A` without a rating */
  formattedRating: string;
}

export interface FeedbackCreate {
  member_id: string;
  organization_id: string;
  content: string;
  feedback_type: FeedbackType;
  rating: number;
  provider_id?: string;
  category?: FeedbackCategory;
  priority?: FeedbackPriority;
  visibility?: FeedbackVisibility;
  tags?: string[];
}

export interface FeedbackUpdate {
  content?: string;
  feedback_type?: FeedbackType;
  rating?: number;
  category?: FeedbackCategory;
  priority?: FeedbackPriority;
  visibility?: FeedbackVisibility;
  status?: FeedbackStatus;
  tags?: string[];
}

export interface FeedbackFilter extends ListParams {
  member_id?: string;
  organization_id?: string;
  provider_id?: string;
  feedback_type?: FeedbackType[];
  category?: FeedbackCategory[];
  priority?: FeedbackPriority[];
  status?: FeedbackStatus[];
  min_rating?: number;
  max_rating?: number;
  start_date?: Date;
  end_date?: Date;
  search?: string;
  tags?: string[];
  exclude_deleted?: boolean;
}

export interface FeedbackStats {
  total_count: number;
  average_rating: number;
  rating_distribution: Record<string, number>;
  feedback_type_counts: Record<string, number>;
  category_breakdown: Record<string, number>;
  priority_distribution: Record<string, number>;
  status_summary: Record<string, number>;
  recent_feedback_count: number;
  member_participation_rate: number;
}
