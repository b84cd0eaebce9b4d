import type { CourseStudentProfile } from '@shared/schema';
import { participantColumns, participantKey, type IStorage, type ParticipantIdentity } from '../storage';
import { ConflictError, DataIntegrityError, isUniqueViolation } from '../errors';
import type { ScoreResult } from './survey-service';

function assertSingleCurrent(
  rows: CourseStudentProfile[],
  courseId: string,
  participant: ParticipantIdentity,
): CourseStudentProfile | null {
  if (rows.length > 1) {
    console.error(`[Profile] ${rows.length} current profiles for ${participantKey(participant)} in course ${courseId}`);
    throw new DataIntegrityError(
      'MULTIPLE_CURRENT_PROFILES',
      `Found ${rows.length} current profiles for ${participantKey(participant)} in course ${courseId}`,
    );
  }
  return rows[0] ?? null;
}

export async function getCurrentProfile(
  storage: IStorage,
  courseId: string,
  participant: ParticipantIdentity,
): Promise<CourseStudentProfile | null> {
  const rows = await storage.listProfiles(courseId, participant, true);
  return assertSingleCurrent(rows, courseId, participant);
}

export async function listProfileHistory(
  storage: IStorage,
  courseId: string,
  participant: ParticipantIdentity,
): Promise<CourseStudentProfile[]> {
  return storage.listProfiles(courseId, participant, false);
}

/**
 * Supersedes the participant's current profile with a new one.
 * The old row is flipped to not-current (history is kept, never deleted)
 * and the new row inserted in one unit of work: either both land or neither does.
 */
export async function upsertProfile(
  storage: IStorage,
  courseId: string,
  participant: ParticipantIdentity,
  scoreResult: ScoreResult,
  submissionId: string | null,
): Promise<CourseStudentProfile> {
  return storage.transaction(async (tx) => {
    const previous = assertSingleCurrent(
      await tx.listProfiles(courseId, participant, true),
      courseId,
      participant,
    );

    if (previous) {
      await tx.markProfileNotCurrent(previous.id);
    }

    let profile: CourseStudentProfile;
    try {
      profile = await tx.insertProfile({
        courseId,
        ...participantColumns(participant),
        learningStyle: scoreResult.dominantCategory,
        scores: { ...scoreResult.totals },
        submissionId,
        isCurrent: true,
      });
    } catch (error) {
      // Another baseline for the same participant committed a current row first
      if (isUniqueViolation(error)) {
        console.warn(`[Profile] Concurrent baseline for ${participantKey(participant)} in course ${courseId}`);
        throw new ConflictError(
          'PROFILE_UPDATE_CONFLICT',
          `Another baseline for ${participantKey(participant)} in course ${courseId} was saved at the same time; retry`,
        );
      }
      throw error;
    }

    console.log(
      `[Profile] course=${courseId} participant=${participantKey(participant)} ` +
      `style=${profile.learningStyle ?? 'none'} superseded=${previous?.id ?? 'none'}`,
    );
    return profile;
  });
}
