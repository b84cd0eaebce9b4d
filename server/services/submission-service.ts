/**
 * Submission orchestrator
 * server/services/submission-service.ts
 *
 * Pipeline (one transaction per submission):
 *   lock session → check OPEN + mood → score answers (if the session requires the survey)
 *   → upsert submission → supersede profile + clear rebaseline flag (current baseline survey only)
 *   → resolve recommendation
 */

import type { ClassSession, CourseStudentProfile, Submission, SubmissionAnswers } from '@shared/schema';
import { participantColumns, participantKey, type IStorage, type ParticipantIdentity } from '../storage';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { afterSubmission } from './baseline-service';
import { getCurrentProfile, upsertProfile } from './profile-service';
import { buildAnswerDetails, scoreAnswers, type ScoreResult } from './survey-service';
import { recommendForParticipant, type RecommendationPayload } from './recommendation-service';
import { sessionDate } from './session-service';

export interface SubmissionRequest {
  sessionId: string;
  participant: ParticipantIdentity;
  mood: string;
  answers?: SubmissionAnswers | null;
}

export interface SubmissionOutcome {
  submission: Submission;
  scoreResult: ScoreResult | null;
  profile: CourseStudentProfile | null;
  requiresRebaseline: boolean;
  recommendation: RecommendationPayload;
}

function hasAnswers(answers: SubmissionAnswers | null | undefined): answers is SubmissionAnswers {
  return answers != null && Object.keys(answers).length > 0;
}

async function upsertSubmissionRow(
  tx: IStorage,
  session: ClassSession,
  request: SubmissionRequest,
  scoreResult: ScoreResult | null,
): Promise<Submission> {
  const { participant } = request;
  const answers = scoreResult && hasAnswers(request.answers) && session.surveySnapshot
    ? { raw: { ...request.answers }, details: buildAnswerDetails(session.surveySnapshot, request.answers) }
    : null;

  const fields = {
    mood: request.mood,
    answers,
    totalScores: scoreResult ? { ...scoreResult.totals } : null,
    isBaselineUpdate: scoreResult !== null,
  };

  const existing = await tx.findSubmission(session.id, participant);
  if (existing) {
    const updated = await tx.updateSubmission(existing.id, {
      ...fields,
      guestName: participant.kind === 'guest' ? participant.guestName ?? existing.guestName : null,
    });
    if (!updated) {
      throw new NotFoundError('SUBMISSION_NOT_FOUND', `Submission ${existing.id} disappeared during update`);
    }
    return updated;
  }

  return tx.insertSubmission({
    sessionId: session.id,
    courseId: session.courseId,
    ...participantColumns(participant),
    guestName: participant.kind === 'guest' ? participant.guestName ?? null : null,
    ...fields,
  });
}

export async function submit(storage: IStorage, request: SubmissionRequest): Promise<SubmissionOutcome> {
  return storage.transaction(async (tx) => {
    // Closing takes the same lock, so a late submission cannot slip past a close
    const session = await tx.lockSession(request.sessionId);
    if (!session) {
      throw new NotFoundError('SESSION_NOT_FOUND', `Session ${request.sessionId} not found`);
    }
    if (session.closedAt !== null) {
      throw new ConflictError('SESSION_CLOSED', `Session ${session.id} is closed`);
    }

    const course = await tx.getCourse(session.courseId);
    if (!course) {
      throw new NotFoundError('COURSE_NOT_FOUND', `Course ${session.courseId} not found`);
    }

    // Session options are frozen at creation; later course relabels do not apply here
    if (!session.moodOptions.includes(request.mood)) {
      throw new ValidationError('INVALID_MOOD', `Mood "${request.mood}" is not one of this session's options`);
    }

    let scoreResult: ScoreResult | null = null;
    if (session.requireSurvey) {
      if (!hasAnswers(request.answers) || !session.surveySnapshot) {
        throw new ValidationError('ANSWERS_REQUIRED', 'This session requires the baseline survey');
      }
      scoreResult = scoreAnswers(session.surveySnapshot, request.answers, course.learningStyleCategories);
    } else if (hasAnswers(request.answers)) {
      console.warn(`[Submission] Ignoring survey answers for session ${session.id}: survey not required`);
    }

    const submission = await upsertSubmissionRow(tx, session, request, scoreResult);

    let profile: CourseStudentProfile | null;
    let requiresRebaseline = course.requiresRebaseline;
    if (scoreResult) {
      profile = await upsertProfile(tx, course.id, request.participant, scoreResult, submission.id);
      // Answers to a superseded survey still update the profile but do not count as the new baseline
      const scoredCurrentBaseline = session.surveyId === course.baselineSurveyId;
      if (!scoredCurrentBaseline && course.requiresRebaseline) {
        console.log(`[Submission] session=${session.id} scored survey ${session.surveyId} but course baseline is ${course.baselineSurveyId}; rebaseline still required`);
      }
      requiresRebaseline = (await afterSubmission(tx, course, scoredCurrentBaseline)).requiresRebaseline;
    } else {
      profile = await getCurrentProfile(tx, course.id, request.participant);
    }

    const learningStyle = scoreResult ? scoreResult.dominantCategory : profile?.learningStyle ?? null;

    const recommendation = await recommendForParticipant(tx, {
      courseId: course.id,
      learningStyle,
      mood: request.mood,
      participantKey: participantKey(request.participant),
      sessionDate: sessionDate(session),
    });

    console.log(
      `[Submission] session=${session.id} participant=${participantKey(request.participant)} ` +
      `submission=${submission.id} baseline=${scoreResult !== null} style=${learningStyle ?? 'none'}`,
    );

    return { submission, scoreResult, profile, requiresRebaseline, recommendation };
  });
}

export async function submitByJoinToken(
  storage: IStorage,
  joinToken: string,
  request: Omit<SubmissionRequest, 'sessionId'>,
): Promise<SubmissionOutcome> {
  const session = await storage.getSessionByJoinToken(joinToken);
  if (!session) {
    throw new NotFoundError('SESSION_NOT_FOUND', 'No session for this join token');
  }
  return submit(storage, { ...request, sessionId: session.id });
}
