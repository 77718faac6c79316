// src/types/trainingCenter.ts

export interface AddressInput {
  detailed_address: string;
  city: string;
  state: string;
  pincode: string;
}

/** Body of POST /training-center after parsing. */
export interface CreateTrainingCenterRequest {
  center_name: string;
  center_code: string;
  address: AddressInput;
  contact_phone: string;
  student_capacity?: number | null;
  courses_offered?: string[] | null;
  contact_email?: string | null;
}

/** Flattened row handed to the store; id and created_on are assigned there. */
export interface NewTrainingCenter {
  center_name: string;
  center_code: string;
  detailed_address: string;
  city: string;
  state: string;
  pincode: string;
  student_capacity: number | null;
  courses_offered: string[];
  contact_email: string | null;
  contact_phone: string;
}

export interface TrainingCenterRecord extends NewTrainingCenter {
  id: number;
  created_on: number; // unix seconds
}

export interface TrainingCenterWire {
  center_name: string;
  center_code: string;
  address: AddressInput;
  student_capacity: number | null;
  courses_offered: string[];
  created_on: number;
  contact_email: string | null;
  contact_phone: string;
}

export type TrainingCenterFilterKey = "city" | "state" | "pincode";

export type TrainingCenterFilters = Partial<Record<TrainingCenterFilterKey, string>>;
