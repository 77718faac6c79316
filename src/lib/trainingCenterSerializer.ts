// src/lib/trainingCenterSerializer.ts
import type {
  CreateTrainingCenterRequest,
  NewTrainingCenter,
  TrainingCenterRecord,
  TrainingCenterWire,
} from "../types/trainingCenter";

export const COURSE_SEPARATOR = ",";

/**
 * Courses are stored as a native array. Rows written before that still carry
 * one comma-joined string, so reads accept both shapes.
 */
export function splitCourses(stored: string[] | string | null | undefined): string[] {
  if (!stored) return [];
  if (Array.isArray(stored)) return [...stored];
  return stored.split(COURSE_SEPARATOR);
}

// Writes the legacy comma-joined form; a course containing "," does not survive it.
export function joinCourses(courses: readonly string[]): string {
  return courses.join(COURSE_SEPARATOR);
}

export function toWire(record: TrainingCenterRecord): TrainingCenterWire {
  return {
    center_name: record.center_name,
    center_code: record.center_code,
    address: {
      detailed_address: record.detailed_address,
      city: record.city,
      state: record.state,
      pincode: record.pincode,
    },
    student_capacity: record.student_capacity,
    courses_offered: splitCourses(record.courses_offered),
    created_on: record.created_on,
    contact_email: record.contact_email,
    contact_phone: record.contact_phone,
  };
}

// Inverse of toWire minus id/created_on; a TrainingCenterWire is accepted as-is.
export function fromRequest(request: CreateTrainingCenterRequest): NewTrainingCenter {
  const { address } = request;

  return {
    center_name: request.center_name,
    center_code: request.center_code,
    detailed_address: address.detailed_address,
    city: address.city,
    state: address.state,
    pincode: address.pincode,
    student_capacity: request.student_capacity ?? null,
    courses_offered: [...(request.courses_offered ?? [])],
    contact_email: request.contact_email ?? null,
    contact_phone: request.contact_phone,
  };
}
