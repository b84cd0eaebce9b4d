import {
  GENERAL_ACTIVITY_TYPE,
  type Activity,
  type ActivityType,
  type InsertActivity,
  type InsertActivityType,
  type UpdateActivity,
} from '@shared/schema';
import type { ActivityFields, ActivityFilter, IStorage } from '../storage';
import { DataIntegrityError, NotFoundError, ValidationError } from '../errors';
import { getCourse } from './course-service';

export function missingRequiredFields(activityType: ActivityType, content: Record<string, unknown>): string[] {
  return activityType.requiredFields.filter(field => !(field in content));
}

function assertContentComplete(activityType: ActivityType, content: Record<string, unknown>): void {
  const missing = missingRequiredFields(activityType, content);
  if (missing.length > 0) {
    throw new ValidationError(
      'MISSING_REQUIRED_FIELDS',
      `Activity type "${activityType.typeName}" requires content fields: ${missing.join(', ')}`,
    );
  }
}

export async function listActivityTypes(storage: IStorage): Promise<ActivityType[]> {
  return storage.listActivityTypes();
}

export async function createActivityType(storage: IStorage, data: InsertActivityType): Promise<ActivityType> {
  if (data.typeName === GENERAL_ACTIVITY_TYPE || await storage.getActivityType(data.typeName)) {
    throw new ValidationError('ACTIVITY_TYPE_EXISTS', `Activity type "${data.typeName}" already exists`);
  }
  const activityType = await storage.createActivityType(data);
  console.log(`[Activity] Registered activity type "${activityType.typeName}"`);
  return activityType;
}

export async function addActivity(storage: IStorage, courseId: string, data: InsertActivity): Promise<Activity> {
  await getCourse(storage, courseId);

  const typeName = data.type ?? GENERAL_ACTIVITY_TYPE;
  if (typeName !== GENERAL_ACTIVITY_TYPE) {
    const activityType = await storage.getActivityType(typeName);
    if (!activityType) {
      throw new NotFoundError('ACTIVITY_TYPE_NOT_FOUND', `Activity type "${typeName}" not found`);
    }
    assertContentComplete(activityType, data.content ?? {});
  }

  const activity = await storage.createActivity(courseId, { ...data, type: typeName });
  console.log(`[Activity] Added activity ${activity.id} (${activity.type}) to course ${courseId}`);
  return activity;
}

export async function getActivity(storage: IStorage, activityId: string): Promise<Activity> {
  const activity = await storage.getActivity(activityId);
  if (!activity) {
    throw new NotFoundError('ACTIVITY_NOT_FOUND', `Activity ${activityId} not found`);
  }
  return activity;
}

export async function listCourseActivities(
  storage: IStorage,
  courseId: string,
  filter: ActivityFilter = {},
): Promise<Activity[]> {
  await getCourse(storage, courseId);
  return storage.findActivities(courseId, filter);
}

/**
 * Edits an activity's name, summary, tags or content. New content is checked
 * against the required fields of the activity's type.
 */
export async function updateActivity(storage: IStorage, activityId: string, data: UpdateActivity): Promise<Activity> {
  const activity = await getActivity(storage, activityId);

  const patch: ActivityFields = {};
  if (data.name !== undefined) patch.name = data.name;
  if (data.summary !== undefined) patch.summary = data.summary;
  if (data.tags !== undefined) patch.tags = [...data.tags];
  if (data.content !== undefined) {
    if (activity.type !== GENERAL_ACTIVITY_TYPE) {
      const activityType = await storage.getActivityType(activity.type);
      if (!activityType) {
        throw new DataIntegrityError('ACTIVITY_TYPE_MISSING', `Activity ${activity.id} has unknown type "${activity.type}"`);
      }
      assertContentComplete(activityType, data.content);
    }
    patch.content = { ...data.content };
  }

  const updated = await storage.updateActivity(activityId, patch);
  if (!updated) {
    throw new NotFoundError('ACTIVITY_NOT_FOUND', `Activity ${activityId} not found`);
  }
  return updated;
}
