import { z } from 'zod';
import { ValidationError } from './errors.js';
import { durationDays, parseCalendarDate } from './value.js';
import type { TaskInput } from '../models/types.js';

const required = (label: string) =>
  z.string({ required_error: `${label} is required.`, invalid_type_error: `${label} must be text.` })
    .trim()
    .min(1, `${label} is required.`);

const optionalText = z.string().trim().nullish().transform(v => (v ? v : null));

const calendarDate = (label: string) => required(label).superRefine((v, ctx) => {
  try {
    parseCalendarDate(v, label);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
  }
});

export const taskDraftSchema = z.object({
  title: required('Title'),
  description: required('Description'),
  location: required('Location'),
  address: required('Address'),
  contact_email: required('Contact email').email('Contact email must be a valid email address.'),
  contact_phone: required('Contact phone'),
  start_date: calendarDate('Start date'),
  end_date: calendarDate('End date'),
  hours_per_day: z
    .number({ required_error: 'Hours per day is required.', invalid_type_error: 'Hours per day must be a number.' })
    .finite('Hours per day must be a number.')
    .int('Hours per day must be a whole number.')
    .min(1, 'Hours per day must be at least 1.')
    .max(24, 'Hours per day cannot exceed 24.'),
  category: optionalText,
  required_skills: optionalText,
  urgency: optionalText,
  age_requirement: optionalText,
  physical_requirements: optionalText,
  equipment_needed: optionalText,
  deadline: optionalText,
  max_volunteers: z
    .number({ invalid_type_error: 'Max volunteers must be a number.' })
    .finite('Max volunteers must be a number.')
    .int('Max volunteers must be a whole number.')
    .min(1, 'Max volunteers must be at least 1.')
    .nullish()
    .transform(v => v ?? null),
  wage_rate: z
    .number({ invalid_type_error: 'Wage rate must be a number.' })
    .finite('Wage rate must be a number.')
    .nonnegative('Wage rate cannot be negative.')
    .nullish()
    .transform(v => v ?? null),
});

/** What callers pass to createTask/editTask; optional fields may be omitted. */
export type TaskDraft = z.input<typeof taskDraftSchema>;

export const applicationSchema = z.object({
  contact_email: required('Contact email').email('Contact email must be a valid email address.'),
  contact_phone: required('Contact phone'),
  motivation: required('Motivation'),
  availability_date: calendarDate('Availability date').optional(),
  hours_committed: z
    .number({ invalid_type_error: 'Hours committed must be a number.' })
    .finite('Hours committed must be a number.')
    .int('Hours committed must be a whole number.')
    .min(1, 'Hours committed must be at least 1.')
    .optional(),
});

export type ApplicationInput = z.input<typeof applicationSchema>;

export const deletionReasonSchema = required('Deletion reason');
export const completionNoteSchema = required('A note explaining why the task was not completed');

/** Parses input against a schema, surfacing the first issue as a ValidationError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid input.');
  }
  return parsed.data;
}

/** Validates a full task draft, including the start/end ordering. */
export function parseTaskDraft(draft: unknown): TaskInput {
  const input = parseInput(taskDraftSchema, draft);
  durationDays(input.start_date, input.end_date);
  return input;
}
