import { randomUUID } from "crypto";
import type {
  Activity,
  ActivityType,
  ClassSession,
  Course,
  CourseRecommendation,
  CourseStudentProfile,
  InsertActivity,
  InsertActivityType,
  InsertClassSession,
  InsertCourseStudentProfile,
  InsertSubmission,
  InsertSurvey,
  Submission,
  Survey,
} from "@shared/schema";
import type {
  ActivityFields,
  ActivityFilter,
  CourseFields,
  InsertRecommendation,
  IStorage,
  ParticipantIdentity,
} from "../../server/storage";

interface Tables {
  surveys: Survey[];
  courses: Course[];
  sessions: ClassSession[];
  activityTypes: ActivityType[];
  activities: Activity[];
  recommendations: CourseRecommendation[];
  profiles: CourseStudentProfile[];
  submissions: Submission[];
}

function emptyTables(): Tables {
  return {
    surveys: [],
    courses: [],
    sessions: [],
    activityTypes: [],
    activities: [],
    recommendations: [],
    profiles: [],
    submissions: [],
  };
}

function matchesParticipant(row: { studentId: string | null; guestId: string | null }, participant: ParticipantIdentity): boolean {
  return participant.kind === 'student'
    ? row.studentId === participant.studentId
    : row.guestId === participant.guestId;
}

// Same shape as the driver's error for a unique_violation
class UniqueViolation extends Error {
  readonly code = '23505';

  constructor(constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
  }
}

/**
 * In-memory IStorage for tests. Enforces the same unique constraints as the
 * database schema; a failed transaction restores the tables it started with.
 */
export class MemStorage implements IStorage {
  tables: Tables = emptyTables();
  // Monotonic clock so "newest first" ordering is deterministic
  private tick = 0;

  protected now(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2025, 0, 15, 9, 0, 0) + this.tick * 1000);
  }

  async transaction<T>(work: (tx: IStorage) => Promise<T>): Promise<T> {
    const saved = structuredClone(this.tables);
    try {
      return await work(this);
    } catch (error) {
      this.tables = saved;
      throw error;
    }
  }

  async getSurvey(id: string): Promise<Survey | undefined> {
    return this.tables.surveys.find(survey => survey.id === id);
  }

  async createSurvey(data: InsertSurvey): Promise<Survey> {
    const now = this.now();
    const survey: Survey = { id: randomUUID(), title: data.title, questions: structuredClone(data.questions), createdAt: now, updatedAt: now };
    this.tables.surveys.push(survey);
    return survey;
  }

  async updateSurvey(id: string, data: InsertSurvey): Promise<Survey | undefined> {
    const survey = await this.getSurvey(id);
    if (!survey) return undefined;
    survey.title = data.title;
    survey.questions = structuredClone(data.questions);
    survey.updatedAt = this.now();
    return survey;
  }

  async getCourse(id: string): Promise<Course | undefined> {
    return this.tables.courses.find(course => course.id === id);
  }

  async listCourses(): Promise<Course[]> {
    return [...this.tables.courses].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async createCourse(data: CourseFields): Promise<Course> {
    const now = this.now();
    const course: Course = { id: randomUUID(), ...data, createdAt: now, updatedAt: now };
    this.tables.courses.push(course);
    return course;
  }

  async updateCourse(id: string, data: Partial<CourseFields>): Promise<Course | undefined> {
    const index = this.tables.courses.findIndex(course => course.id === id);
    if (index === -1) return undefined;
    const updated: Course = { ...this.tables.courses[index], ...data, updatedAt: this.now() };
    this.tables.courses[index] = updated;
    return updated;
  }

  async createSession(data: InsertClassSession): Promise<ClassSession> {
    if (this.tables.sessions.some(session => session.joinToken === data.joinToken)) {
      throw new UniqueViolation('class_sessions_join_token_unique');
    }
    const session: ClassSession = {
      id: randomUUID(),
      courseId: data.courseId,
      surveyId: data.surveyId ?? null,
      requireSurvey: data.requireSurvey ?? false,
      surveySnapshot: data.surveySnapshot ?? null,
      moodPrompt: data.moodPrompt,
      moodOptions: [...data.moodOptions],
      joinToken: data.joinToken,
      startedAt: data.startedAt ?? this.now(),
      closedAt: data.closedAt ?? null,
    };
    this.tables.sessions.push(session);
    return session;
  }

  async getSession(id: string): Promise<ClassSession | undefined> {
    return this.tables.sessions.find(session => session.id === id);
  }

  async getSessionByJoinToken(joinToken: string): Promise<ClassSession | undefined> {
    return this.tables.sessions.find(session => session.joinToken === joinToken);
  }

  async listSessions(courseId: string): Promise<ClassSession[]> {
    return this.tables.sessions
      .filter(session => session.courseId === courseId)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
  }

  async lockSession(id: string): Promise<ClassSession | undefined> {
    return this.getSession(id);
  }

  async closeSession(id: string, closedAt: Date): Promise<ClassSession | undefined> {
    const session = await this.getSession(id);
    if (!session) return undefined;
    session.closedAt = closedAt;
    return session;
  }

  async getActivityType(typeName: string): Promise<ActivityType | undefined> {
    return this.tables.activityTypes.find(activityType => activityType.typeName === typeName);
  }

  async listActivityTypes(): Promise<ActivityType[]> {
    return [...this.tables.activityTypes].sort((a, b) => (a.typeName < b.typeName ? -1 : a.typeName > b.typeName ? 1 : 0));
  }

  async createActivityType(data: InsertActivityType): Promise<ActivityType> {
    if (await this.getActivityType(data.typeName)) {
      throw new UniqueViolation('activity_types_pkey');
    }
    const now = this.now();
    const activityType: ActivityType = {
      typeName: data.typeName,
      description: data.description,
      requiredFields: [...data.requiredFields],
      optionalFields: [...data.optionalFields],
      exampleContent: data.exampleContent ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.activityTypes.push(activityType);
    return activityType;
  }

  async createActivity(courseId: string, data: InsertActivity): Promise<Activity> {
    const now = this.now();
    const activity: Activity = {
      id: randomUUID(),
      courseId,
      name: data.name,
      summary: data.summary ?? '',
      type: data.type ?? 'general',
      tags: [...(data.tags ?? [])],
      content: data.content ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.tables.activities.push(activity);
    return activity;
  }

  async updateActivity(id: string, data: ActivityFields): Promise<Activity | undefined> {
    const index = this.tables.activities.findIndex(activity => activity.id === id);
    if (index === -1) return undefined;
    const updated: Activity = { ...this.tables.activities[index], ...data, updatedAt: this.now() };
    this.tables.activities[index] = updated;
    return updated;
  }

  async findActivities(courseId: string, filter: ActivityFilter): Promise<Activity[]> {
    return this.tables.activities
      .filter(activity => activity.courseId === courseId)
      .filter(activity => !filter.type || activity.type === filter.type)
      .filter(activity => !filter.tag || activity.tags.includes(filter.tag))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getActivity(id: string): Promise<Activity | undefined> {
    return this.tables.activities.find(activity => activity.id === id);
  }

  async listActivities(courseId: string): Promise<Activity[]> {
    return this.tables.activities
      .filter(activity => activity.courseId === courseId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async listRecommendations(courseId: string): Promise<CourseRecommendation[]> {
    return this.tables.recommendations
      .filter(row => row.courseId === courseId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  async insertRecommendation(data: InsertRecommendation): Promise<CourseRecommendation> {
    const key = { learningStyle: data.learningStyle ?? null, mood: data.mood ?? null, isStyleDefault: data.isStyleDefault ?? false };
    const clash = this.tables.recommendations.some(row =>
      row.courseId === data.courseId
      && row.learningStyle === key.learningStyle
      && row.mood === key.mood
      && row.isStyleDefault === key.isStyleDefault);
    if (clash) throw new UniqueViolation('uq_course_style_mood');

    const now = this.now();
    const row: CourseRecommendation = {
      id: randomUUID(),
      courseId: data.courseId,
      ...key,
      activityId: data.activityId,
      isAuto: data.isAuto ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.recommendations.push(row);
    return row;
  }

  async updateRecommendation(id: string, data: { activityId: string; isAuto: boolean }): Promise<CourseRecommendation | undefined> {
    const row = this.tables.recommendations.find(candidate => candidate.id === id);
    if (!row) return undefined;
    row.activityId = data.activityId;
    row.isAuto = data.isAuto;
    row.updatedAt = this.now();
    return row;
  }

  async listProfiles(courseId: string, participant: ParticipantIdentity, currentOnly: boolean): Promise<CourseStudentProfile[]> {
    return this.tables.profiles
      .filter(row => row.courseId === courseId && matchesParticipant(row, participant))
      .filter(row => !currentOnly || row.isCurrent)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async listCurrentProfilesForCourse(courseId: string): Promise<CourseStudentProfile[]> {
    return this.tables.profiles.filter(row => row.courseId === courseId && row.isCurrent);
  }

  async markProfileNotCurrent(id: string): Promise<void> {
    const row = this.tables.profiles.find(candidate => candidate.id === id);
    if (row) row.isCurrent = false;
  }

  async insertProfile(data: InsertCourseStudentProfile): Promise<CourseStudentProfile> {
    const row: CourseStudentProfile = {
      id: randomUUID(),
      courseId: data.courseId,
      studentId: data.studentId ?? null,
      guestId: data.guestId ?? null,
      learningStyle: data.learningStyle ?? null,
      scores: { ...data.scores },
      submissionId: data.submissionId ?? null,
      isCurrent: data.isCurrent ?? true,
      createdAt: this.now(),
    };
    const clash = row.isCurrent && this.tables.profiles.some(other =>
      other.isCurrent
      && other.courseId === row.courseId
      && ((row.studentId !== null && other.studentId === row.studentId)
        || (row.guestId !== null && other.guestId === row.guestId)));
    if (clash) throw new UniqueViolation('uq_course_student_current');

    this.tables.profiles.push(row);
    return row;
  }

  async findSubmission(sessionId: string, participant: ParticipantIdentity): Promise<Submission | undefined> {
    return this.tables.submissions.find(row => row.sessionId === sessionId && matchesParticipant(row, participant));
  }

  async insertSubmission(data: InsertSubmission): Promise<Submission> {
    const clash = this.tables.submissions.some(row =>
      row.sessionId === data.sessionId
      && ((data.studentId != null && row.studentId === data.studentId)
        || (data.guestId != null && row.guestId === data.guestId)));
    if (clash) throw new UniqueViolation('uq_session_participant');

    const now = this.now();
    const row: Submission = {
      id: randomUUID(),
      sessionId: data.sessionId,
      courseId: data.courseId,
      studentId: data.studentId ?? null,
      guestId: data.guestId ?? null,
      guestName: data.guestName ?? null,
      mood: data.mood,
      answers: data.answers ?? null,
      totalScores: data.totalScores ?? null,
      isBaselineUpdate: data.isBaselineUpdate ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.submissions.push(row);
    return row;
  }

  async updateSubmission(id: string, data: Partial<InsertSubmission>): Promise<Submission | undefined> {
    const index = this.tables.submissions.findIndex(row => row.id === id);
    if (index === -1) return undefined;
    const current = this.tables.submissions[index];
    const updated: Submission = {
      ...current,
      mood: data.mood ?? current.mood,
      guestName: data.guestName !== undefined ? data.guestName : current.guestName,
      answers: data.answers !== undefined ? data.answers : current.answers,
      totalScores: data.totalScores !== undefined ? data.totalScores : current.totalScores,
      isBaselineUpdate: data.isBaselineUpdate ?? current.isBaselineUpdate,
      updatedAt: this.now(),
    };
    this.tables.submissions[index] = updated;
    return updated;
  }

  async listSubmissions(sessionId: string): Promise<Submission[]> {
    return this.tables.submissions
      .filter(row => row.sessionId === sessionId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
