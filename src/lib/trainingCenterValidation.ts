// src/lib/trainingCenterValidation.ts
import { ValidationError } from "../middleware/errorHandler";
import type { AddressInput, CreateTrainingCenterRequest } from "../types/trainingCenter";

export const MAX_CENTER_NAME_LENGTH = 40;
export const CENTER_CODE_LENGTH = 12;

const REQUIRED_FIELDS = ["center_name", "center_code", "address", "contact_phone"] as const;
const ADDRESS_FIELDS = ["detailed_address", "city", "state", "pincode"] as const;

// Anchored at the start only: "a@b.c trailing" still passes.
const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+/;
const PHONE_PATTERN = /^[0-9]{10}$/;

type Payload = Record<string, unknown>;

const isObject = (value: unknown): value is Payload =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isValidEmail = (email: string) => EMAIL_PATTERN.test(email);
export const isValidPhone = (phone: string) => PHONE_PATTERN.test(phone);

function requireString(payload: Payload, field: string): string {
  const value = payload[field];
  if (typeof value !== "string") {
    throw new ValidationError("InvalidType", `${field} must be a string`, field);
  }
  return value;
}

function parseAddress(value: unknown): AddressInput {
  const address: Payload = isObject(value) ? value : {};
  if (!ADDRESS_FIELDS.every((key) => address[key] !== undefined)) {
    throw new ValidationError("IncompleteAddress", "Incomplete address details", "address");
  }

  return {
    detailed_address: requireString(address, "detailed_address"),
    city: requireString(address, "city"),
    state: requireString(address, "state"),
    pincode: requireString(address, "pincode"),
  };
}

function parseCapacity(value: unknown): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError("InvalidType", "student_capacity must be an integer", "student_capacity");
  }
  return value;
}

function parseCourses(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((course): course is string => typeof course === "string")) {
    throw new ValidationError("InvalidType", "courses_offered must be a list of strings", "courses_offered");
  }
  return value;
}

/**
 * Turns an untyped JSON body into a CreateTrainingCenterRequest.
 *
 * Rules run in a fixed order and the first failure wins:
 * required keys, name length, code length, email shape, phone shape, address
 * completeness, then the optional field types. Strings are not trimmed or
 * otherwise sanitised.
 */
export function parseCreateRequest(body: unknown): CreateTrainingCenterRequest {
  const payload: Payload = isObject(body) ? body : {};

  for (const field of REQUIRED_FIELDS) {
    if (payload[field] === undefined) {
      throw new ValidationError("MissingField", `${field} is required`, field);
    }
  }

  const centerName = requireString(payload, "center_name");
  if (centerName.length > MAX_CENTER_NAME_LENGTH) {
    throw new ValidationError("FieldTooLong", "CenterName should be less than 40 characters", "center_name");
  }

  const centerCode = requireString(payload, "center_code");
  if (centerCode.length !== CENTER_CODE_LENGTH) {
    throw new ValidationError("InvalidLength", "CenterCode should be exactly 12 characters", "center_code");
  }

  let contactEmail: string | null = null;
  if (payload.contact_email !== undefined && payload.contact_email !== null) {
    contactEmail = requireString(payload, "contact_email");
    if (!isValidEmail(contactEmail)) {
      throw new ValidationError("InvalidFormat", "Invalid email format", "contact_email");
    }
  }

  const contactPhone = requireString(payload, "contact_phone");
  if (!isValidPhone(contactPhone)) {
    throw new ValidationError("InvalidFormat", "Invalid phone number format", "contact_phone");
  }

  const address = parseAddress(payload.address);

  return {
    center_name: centerName,
    center_code: centerCode,
    address,
    contact_phone: contactPhone,
    student_capacity: parseCapacity(payload.student_capacity),
    courses_offered: parseCourses(payload.courses_offered),
    contact_email: contactEmail,
  };
}
