import type { ProjectConfig } from '../config/schema.js';
import { UsageError } from '../utils/errors.js';

export const STATUS_KEYWORDS = ['backlog', 'ready', 'in-progress', 'in-review', 'done'] as const;
export type StatusKeyword = (typeof STATUS_KEYWORDS)[number];

export const PRIORITIES = ['P0', 'P1', 'P2'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const SIZES = ['XS', 'S', 'M', 'L', 'XL'] as const;
export type Size = (typeof SIZES)[number];

export const UPDATABLE_FIELDS = ['priority', 'size', 'estimate'] as const;
export type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

/** Board display name of each status keyword. */
export const STATUS_DISPLAY: Record<StatusKeyword, string> = {
  'backlog': 'Backlog',
  'ready': 'Ready',
  'in-progress': 'In progress',
  'in-review': 'In review',
  'done': 'Done',
};

/** Estimate in hours derived from size. */
export const SIZE_ESTIMATES: Record<Size, number> = {
  XS: 1,
  S: 2,
  M: 4,
  L: 8,
  XL: 16,
};

export const DEFAULT_PRIORITY: Priority = 'P2';
export const DEFAULT_SIZE: Size = 'M';

export function isStatusKeyword(value: string): value is StatusKeyword {
  return STATUS_KEYWORDS.some((keyword) => keyword === value);
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

export function isSize(value: string): value is Size {
  return SIZES.some((size) => size === value);
}

export function isUpdatableField(value: string): value is UpdatableField {
  return UPDATABLE_FIELDS.some((field) => field === value);
}

export function parseStatusKeyword(value: string): StatusKeyword {
  const normalized = value.trim().toLowerCase();
  if (!isStatusKeyword(normalized)) {
    throw new UsageError(`Invalid status '${value}'`, { argument: 'status', value, allowed: STATUS_KEYWORDS });
  }
  return normalized;
}

export function statusOptionId(project: ProjectConfig, keyword: StatusKeyword): string {
  const options = project.statusOptions;
  switch (keyword) {
    case 'backlog':
      return options.backlog;
    case 'ready':
      return options.ready;
    case 'in-progress':
      return options.inProgress;
    case 'in-review':
      return options.inReview;
    case 'done':
      return options.done;
  }
}

export function estimateForSize(size: Size): number {
  return SIZE_ESTIMATES[size];
}

/**
 * Lenient parsing used when creating an issue: unknown values fall back to
 * the defaults and the caller reports a warning.
 */
export function normalizePriority(value: string | undefined): { value: Priority; fallback: boolean } {
  const upper = value?.trim().toUpperCase() ?? '';
  if (isPriority(upper)) return { value: upper, fallback: false };
  return { value: DEFAULT_PRIORITY, fallback: value !== undefined && value !== '' };
}

export function normalizeSize(value: string | undefined): { value: Size; fallback: boolean } {
  const upper = value?.trim().toUpperCase() ?? '';
  if (isSize(upper)) return { value: upper, fallback: false };
  return { value: DEFAULT_SIZE, fallback: value !== undefined && value !== '' };
}

/**
 * What a field update resolves to before any network call.
 */
export type FieldUpdate =
  | { field: 'priority'; fieldId: string; kind: 'option'; optionId: string; display: string }
  | { field: 'size'; fieldId: string; kind: 'option'; optionId: string; display: string }
  | { field: 'estimate'; fieldId: string; kind: 'number'; value: number; display: string };

/**
 * Strict resolution for `update-field`: any unknown field or value is a
 * UsageError.
 */
export function resolveFieldUpdate(project: ProjectConfig, field: string, value: string): FieldUpdate {
  const fieldName = field.trim().toLowerCase();
  if (!isUpdatableField(fieldName)) {
    throw new UsageError(`Invalid field '${field}'`, { argument: 'field', value: field, allowed: UPDATABLE_FIELDS });
  }

  switch (fieldName) {
    case 'priority': {
      const priority = value.trim().toUpperCase();
      if (!isPriority(priority)) {
        throw new UsageError(`Invalid priority '${value}'`, { argument: 'value', value, allowed: PRIORITIES });
      }
      return {
        field: 'priority',
        fieldId: project.fields.priority,
        kind: 'option',
        optionId: project.priorityOptions[priority],
        display: priority,
      };
    }
    case 'size': {
      const size = value.trim().toUpperCase();
      if (!isSize(size)) {
        throw new UsageError(`Invalid size '${value}'`, { argument: 'value', value, allowed: SIZES });
      }
      return {
        field: 'size',
        fieldId: project.fields.size,
        kind: 'option',
        optionId: project.sizeOptions[size],
        display: size,
      };
    }
    case 'estimate': {
      const trimmed = value.trim();
      if (!/^[0-9]+$/.test(trimmed)) {
        throw new UsageError(`Estimate must be a whole number of hours, got '${value}'`, { argument: 'value', value });
      }
      return {
        field: 'estimate',
        fieldId: project.fields.estimate,
        kind: 'number',
        value: Number(trimmed),
        display: `${trimmed} hours`,
      };
    }
  }
}

/**
 * Parse a positive issue number argument.
 */
export function parseIssueNumber(value: string): number {
  const trimmed = value.trim().replace(/^#/, '');
  if (!/^[0-9]+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new UsageError(`Invalid issue number '${value}'`, { argument: 'issue', value });
  }
  return Number(trimmed);
}
