import type {
  Course,
  InsertCourse,
  InsertSurvey,
  Survey,
  UpdateCourse,
} from '@shared/schema';
import type { CourseFields, IStorage } from '../storage';
import { NotFoundError, ValidationError } from '../errors';
import { markRebaselineRequired } from './baseline-service';

async function assertSurveyExists(storage: IStorage, surveyId: string | null | undefined): Promise<void> {
  if (!surveyId) return;
  if (!(await storage.getSurvey(surveyId))) {
    throw new ValidationError('UNKNOWN_SURVEY', `Survey ${surveyId} not found`);
  }
}

export async function getCourse(storage: IStorage, courseId: string): Promise<Course> {
  const course = await storage.getCourse(courseId);
  if (!course) {
    throw new NotFoundError('COURSE_NOT_FOUND', `Course ${courseId} not found`);
  }
  return course;
}

export async function listCourses(storage: IStorage): Promise<Course[]> {
  return storage.listCourses();
}

// New courses always start by collecting a baseline
export async function createCourse(storage: IStorage, data: InsertCourse): Promise<Course> {
  await assertSurveyExists(storage, data.baselineSurveyId);
  const course = await storage.createCourse({
    title: data.title,
    baselineSurveyId: data.baselineSurveyId ?? null,
    learningStyleCategories: [...data.learningStyleCategories],
    moodLabels: [...data.moodLabels],
    requiresRebaseline: true,
  });
  console.log(`[Course] Created course ${course.id} "${course.title}"`);
  return course;
}

export async function updateCourse(storage: IStorage, courseId: string, data: UpdateCourse): Promise<Course> {
  return storage.transaction(async (tx) => {
    const current = await getCourse(tx, courseId);
    await assertSurveyExists(tx, data.baselineSurveyId);

    const patch: Partial<CourseFields> = {};
    if (data.title !== undefined) patch.title = data.title;
    if (data.learningStyleCategories !== undefined) patch.learningStyleCategories = [...data.learningStyleCategories];
    if (data.moodLabels !== undefined) patch.moodLabels = [...data.moodLabels];
    if (data.baselineSurveyId !== undefined) patch.baselineSurveyId = data.baselineSurveyId;

    const updated = await tx.updateCourse(courseId, patch);
    if (!updated) {
      throw new NotFoundError('COURSE_NOT_FOUND', `Course ${courseId} not found`);
    }

    if (data.baselineSurveyId !== undefined && data.baselineSurveyId !== current.baselineSurveyId) {
      return markRebaselineRequired(tx, courseId, 'baseline survey changed');
    }
    return updated;
  });
}

export async function createSurvey(storage: IStorage, data: InsertSurvey): Promise<Survey> {
  return storage.createSurvey(data);
}

export async function getSurvey(storage: IStorage, surveyId: string): Promise<Survey> {
  const survey = await storage.getSurvey(surveyId);
  if (!survey) {
    throw new NotFoundError('SURVEY_NOT_FOUND', `Survey ${surveyId} not found`);
  }
  return survey;
}

// Sessions keep their own snapshot, so editing the live survey never reaches them
export async function updateSurvey(storage: IStorage, surveyId: string, data: InsertSurvey): Promise<Survey> {
  const survey = await storage.updateSurvey(surveyId, data);
  if (!survey) {
    throw new NotFoundError('SURVEY_NOT_FOUND', `Survey ${surveyId} not found`);
  }
  return survey;
}
