import { and, asc, desc, eq, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn, PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";
import {
  surveys,
  courses,
  classSessions,
  activityTypes,
  activities,
  courseRecommendations,
  submissions,
  courseStudentProfiles,
  type Survey,
  type InsertSurvey,
  type Course,
  type ClassSession,
  type InsertClassSession,
  type ActivityType,
  type InsertActivityType,
  type Activity,
  type InsertActivity,
  type CourseRecommendation,
  type Submission,
  type InsertSubmission,
  type CourseStudentProfile,
  type InsertCourseStudentProfile,
} from "@shared/schema";

// A participant is either an enrolled student or a guest, never both
export type ParticipantIdentity =
  | { kind: 'student'; studentId: string }
  | { kind: 'guest'; guestId: string; guestName?: string | null };

export function participantKey(participant: ParticipantIdentity): string {
  return participant.kind === 'student'
    ? `student:${participant.studentId}`
    : `guest:${participant.guestId}`;
}

export function participantColumns(participant: ParticipantIdentity): {
  studentId: string | null;
  guestId: string | null;
} {
  return participant.kind === 'student'
    ? { studentId: participant.studentId, guestId: null }
    : { studentId: null, guestId: participant.guestId };
}

export interface CourseFields {
  title: string;
  baselineSurveyId: string | null;
  learningStyleCategories: string[];
  moodLabels: string[];
  requiresRebaseline: boolean;
}

export type InsertRecommendation = typeof courseRecommendations.$inferInsert;

export interface ActivityFilter {
  tag?: string;
  type?: string;
}

export type ActivityFields = Partial<Pick<Activity, 'name' | 'summary' | 'tags' | 'content'>>;

export interface IStorage {
  // Runs work atomically; a nested call joins the outer unit of work
  transaction<T>(work: (tx: IStorage) => Promise<T>): Promise<T>;

  getSurvey(id: string): Promise<Survey | undefined>;
  createSurvey(data: InsertSurvey): Promise<Survey>;
  updateSurvey(id: string, data: InsertSurvey): Promise<Survey | undefined>;

  getCourse(id: string): Promise<Course | undefined>;
  listCourses(): Promise<Course[]>;
  createCourse(data: CourseFields): Promise<Course>;
  updateCourse(id: string, data: Partial<CourseFields>): Promise<Course | undefined>;

  createSession(data: InsertClassSession): Promise<ClassSession>;
  getSession(id: string): Promise<ClassSession | undefined>;
  getSessionByJoinToken(joinToken: string): Promise<ClassSession | undefined>;
  // Newest first
  listSessions(courseId: string): Promise<ClassSession[]>;
  // Reads the session row and holds it until the surrounding transaction ends
  lockSession(id: string): Promise<ClassSession | undefined>;
  closeSession(id: string, closedAt: Date): Promise<ClassSession | undefined>;

  getActivityType(typeName: string): Promise<ActivityType | undefined>;
  listActivityTypes(): Promise<ActivityType[]>;
  createActivityType(data: InsertActivityType): Promise<ActivityType>;

  createActivity(courseId: string, data: InsertActivity): Promise<Activity>;
  getActivity(id: string): Promise<Activity | undefined>;
  updateActivity(id: string, data: ActivityFields): Promise<Activity | undefined>;
  // Ordered by id
  listActivities(courseId: string): Promise<Activity[]>;
  // Newest first
  findActivities(courseId: string, filter: ActivityFilter): Promise<Activity[]>;

  listRecommendations(courseId: string): Promise<CourseRecommendation[]>;
  insertRecommendation(data: InsertRecommendation): Promise<CourseRecommendation>;
  updateRecommendation(id: string, data: { activityId: string; isAuto: boolean }): Promise<CourseRecommendation | undefined>;

  // Newest first
  listProfiles(courseId: string, participant: ParticipantIdentity, currentOnly: boolean): Promise<CourseStudentProfile[]>;
  listCurrentProfilesForCourse(courseId: string): Promise<CourseStudentProfile[]>;
  markProfileNotCurrent(id: string): Promise<void>;
  insertProfile(data: InsertCourseStudentProfile): Promise<CourseStudentProfile>;

  findSubmission(sessionId: string, participant: ParticipantIdentity): Promise<Submission | undefined>;
  insertSubmission(data: InsertSubmission): Promise<Submission>;
  updateSubmission(id: string, data: Partial<InsertSubmission>): Promise<Submission | undefined>;
  listSubmissions(sessionId: string): Promise<Submission[]>;
}

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

function participantFilter(
  columns: { studentId: AnyPgColumn; guestId: AnyPgColumn },
  participant: ParticipantIdentity,
) {
  return participant.kind === 'student'
    ? eq(columns.studentId, participant.studentId)
    : eq(columns.guestId, participant.guestId);
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  async transaction<T>(work: (tx: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DatabaseStorage(tx)));
  }

  async getSurvey(id: string): Promise<Survey | undefined> {
    const [survey] = await this.db.select().from(surveys).where(eq(surveys.id, id));
    return survey;
  }

  async createSurvey(data: InsertSurvey): Promise<Survey> {
    const [survey] = await this.db.insert(surveys).values(data).returning();
    return survey;
  }

  async updateSurvey(id: string, data: InsertSurvey): Promise<Survey | undefined> {
    const [survey] = await this.db
      .update(surveys)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(surveys.id, id))
      .returning();
    return survey;
  }

  async getCourse(id: string): Promise<Course | undefined> {
    const [course] = await this.db.select().from(courses).where(eq(courses.id, id));
    return course;
  }

  async listCourses(): Promise<Course[]> {
    return this.db.select().from(courses).orderBy(asc(courses.createdAt));
  }

  async createCourse(data: CourseFields): Promise<Course> {
    const [course] = await this.db.insert(courses).values(data).returning();
    return course;
  }

  async updateCourse(id: string, data: Partial<CourseFields>): Promise<Course | undefined> {
    const [course] = await this.db
      .update(courses)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(courses.id, id))
      .returning();
    return course;
  }

  async createSession(data: InsertClassSession): Promise<ClassSession> {
    const [session] = await this.db.insert(classSessions).values(data).returning();
    return session;
  }

  async getSession(id: string): Promise<ClassSession | undefined> {
    const [session] = await this.db.select().from(classSessions).where(eq(classSessions.id, id));
    return session;
  }

  async getSessionByJoinToken(joinToken: string): Promise<ClassSession | undefined> {
    const [session] = await this.db
      .select()
      .from(classSessions)
      .where(eq(classSessions.joinToken, joinToken));
    return session;
  }

  async listSessions(courseId: string): Promise<ClassSession[]> {
    return this.db
      .select()
      .from(classSessions)
      .where(eq(classSessions.courseId, courseId))
      .orderBy(desc(classSessions.startedAt));
  }

  async lockSession(id: string): Promise<ClassSession | undefined> {
    const [session] = await this.db
      .select()
      .from(classSessions)
      .where(eq(classSessions.id, id))
      .for('update');
    return session;
  }

  async closeSession(id: string, closedAt: Date): Promise<ClassSession | undefined> {
    const [session] = await this.db
      .update(classSessions)
      .set({ closedAt })
      .where(eq(classSessions.id, id))
      .returning();
    return session;
  }

  async getActivityType(typeName: string): Promise<ActivityType | undefined> {
    const [activityType] = await this.db
      .select()
      .from(activityTypes)
      .where(eq(activityTypes.typeName, typeName));
    return activityType;
  }

  async listActivityTypes(): Promise<ActivityType[]> {
    return this.db.select().from(activityTypes).orderBy(asc(activityTypes.typeName));
  }

  async createActivityType(data: InsertActivityType): Promise<ActivityType> {
    const [activityType] = await this.db.insert(activityTypes).values(data).returning();
    return activityType;
  }

  async createActivity(courseId: string, data: InsertActivity): Promise<Activity> {
    const [activity] = await this.db.insert(activities).values({ ...data, courseId }).returning();
    return activity;
  }

  async getActivity(id: string): Promise<Activity | undefined> {
    const [activity] = await this.db.select().from(activities).where(eq(activities.id, id));
    return activity;
  }

  async updateActivity(id: string, data: ActivityFields): Promise<Activity | undefined> {
    const [activity] = await this.db
      .update(activities)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(activities.id, id))
      .returning();
    return activity;
  }

  async listActivities(courseId: string): Promise<Activity[]> {
    return this.db
      .select()
      .from(activities)
      .where(eq(activities.courseId, courseId))
      .orderBy(asc(activities.id));
  }

  async findActivities(courseId: string, filter: ActivityFilter): Promise<Activity[]> {
    const filters: SQL[] = [eq(activities.courseId, courseId)];
    if (filter.type) {
      filters.push(eq(activities.type, filter.type));
    }
    if (filter.tag) {
      filters.push(sql`${activities.tags} @> ${JSON.stringify([filter.tag])}::jsonb`);
    }
    return this.db
      .select()
      .from(activities)
      .where(and(...filters))
      .orderBy(desc(activities.createdAt));
  }

  async listRecommendations(courseId: string): Promise<CourseRecommendation[]> {
    return this.db
      .select()
      .from(courseRecommendations)
      .where(eq(courseRecommendations.courseId, courseId))
      .orderBy(desc(courseRecommendations.updatedAt));
  }

  async insertRecommendation(data: InsertRecommendation): Promise<CourseRecommendation> {
    const [recommendation] = await this.db.insert(courseRecommendations).values(data).returning();
    return recommendation;
  }

  async updateRecommendation(
    id: string,
    data: { activityId: string; isAuto: boolean },
  ): Promise<CourseRecommendation | undefined> {
    const [recommendation] = await this.db
      .update(courseRecommendations)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(courseRecommendations.id, id))
      .returning();
    return recommendation;
  }

  async listProfiles(
    courseId: string,
    participant: ParticipantIdentity,
    currentOnly: boolean,
  ): Promise<CourseStudentProfile[]> {
    const filters = [
      eq(courseStudentProfiles.courseId, courseId),
      participantFilter(courseStudentProfiles, participant),
    ];
    if (currentOnly) {
      filters.push(eq(courseStudentProfiles.isCurrent, true));
    }
    return this.db
      .select()
      .from(courseStudentProfiles)
      .where(and(...filters))
      .orderBy(desc(courseStudentProfiles.createdAt));
  }

  async listCurrentProfilesForCourse(courseId: string): Promise<CourseStudentProfile[]> {
    return this.db
      .select()
      .from(courseStudentProfiles)
      .where(and(
        eq(courseStudentProfiles.courseId, courseId),
        eq(courseStudentProfiles.isCurrent, true),
      ));
  }

  async markProfileNotCurrent(id: string): Promise<void> {
    await this.db
      .update(courseStudentProfiles)
      .set({ isCurrent: false })
      .where(eq(courseStudentProfiles.id, id));
  }

  async insertProfile(data: InsertCourseStudentProfile): Promise<CourseStudentProfile> {
    const [profile] = await this.db.insert(courseStudentProfiles).values(data).returning();
    return profile;
  }

  async findSubmission(sessionId: string, participant: ParticipantIdentity): Promise<Submission | undefined> {
    const [submission] = await this.db
      .select()
      .from(submissions)
      .where(and(
        eq(submissions.sessionId, sessionId),
        participantFilter(submissions, participant),
      ));
    return submission;
  }

  async insertSubmission(data: InsertSubmission): Promise<Submission> {
    const [submission] = await this.db.insert(submissions).values(data).returning();
    return submission;
  }

  async updateSubmission(id: string, data: Partial<InsertSubmission>): Promise<Submission | undefined> {
    const [submission] = await this.db
      .update(submissions)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(submissions.id, id))
      .returning();
    return submission;
  }

  async listSubmissions(sessionId: string): Promise<Submission[]> {
    return this.db
      .select()
      .from(submissions)
      .where(eq(submissions.sessionId, sessionId))
      .orderBy(asc(submissions.createdAt));
  }
}
