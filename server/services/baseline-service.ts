import type { Course } from '@shared/schema';
import type { IStorage } from '../storage';
import { NotFoundError } from '../errors';

// Read once at session creation and frozen into session.requireSurvey
export function shouldForceBaseline(course: Course): boolean {
  return course.requiresRebaseline;
}

/**
 * Clears the course's rebaseline flag once a submission carried survey answers.
 * Must run with the same storage handle as the profile upsert so both commit together.
 * This path only ever clears the flag.
 */
export async function afterSubmission(
  storage: IStorage,
  course: Course,
  includedAnswers: boolean,
): Promise<Course> {
  if (!includedAnswers || !course.requiresRebaseline) {
    return course;
  }

  const updated = await storage.updateCourse(course.id, { requiresRebaseline: false });
  if (!updated) {
    throw new NotFoundError('COURSE_NOT_FOUND', `Course ${course.id} not found`);
  }
  console.log(`[Baseline] Course ${course.id} baseline collected, requires_rebaseline cleared`);
  return updated;
}

// Used by the course create/update path when the baseline survey reference changes
export async function markRebaselineRequired(
  storage: IStorage,
  courseId: string,
  reason: string,
): Promise<Course> {
  const updated = await storage.updateCourse(courseId, { requiresRebaseline: true });
  if (!updated) {
    throw new NotFoundError('COURSE_NOT_FOUND', `Course ${courseId} not found`);
  }
  console.log(`[Baseline] Course ${courseId} requires rebaseline (${reason})`);
  return updated;
}
