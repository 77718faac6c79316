// src/models/TrainingCenter.ts
import { Schema, Connection, Model } from "mongoose";

export interface ITrainingCenter {
  id: number;                 // sequence value from the counters collection, not _id
  center_name: string;
  center_code: string;        // exactly 12 chars, unique
  detailed_address: string;
  city: string;
  state: string;
  pincode: string;
  student_capacity: number | null;
  courses_offered: string[];  // older rows may still hold "a,b,c"
  created_on: number;         // unix seconds
  contact_email: string | null;
  contact_phone: string;
}

export const nowInSeconds = () => Math.floor(Date.now() / 1000);

export const trainingCenterSchema = new Schema<ITrainingCenter>(
  {
    id: { type: Number, required: true, unique: true, immutable: true },
    center_name: { type: String, required: true, maxlength: 40 },
    center_code: { type: String, required: true, unique: true, minlength: 12, maxlength: 12 },
    detailed_address: { type: String, required: true, maxlength: 255 },
    city: { type: String, required: true, maxlength: 100, index: true },
    state: { type: String, required: true, maxlength: 100, index: true },
    pincode: { type: String, required: true, maxlength: 10, index: true },
    student_capacity: { type: Number, default: null },
    courses_offered: { type: [String], default: [] },
    created_on: { type: Number, default: nowInSeconds, immutable: true },
    contact_email: { type: String, default: null, maxlength: 100 },
    contact_phone: { type: String, required: true, maxlength: 15 },
  },
  // `id` is a real path here, so mongoose's own `id` virtual is switched off
  { collection: "trainingcenters", versionKey: false, id: false }
);

export interface ICounter {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { collection: "counters", versionKey: false }
);

export type TrainingCenterModel = Model<ITrainingCenter>;
export type CounterModel = Model<ICounter>;

// Models are bound to the connection they are registered on, never the global mongoose one.
export function getTrainingCenterModel(connection: Connection): TrainingCenterModel {
  return connection.modelNames().includes("TrainingCenter")
    ? connection.model<ITrainingCenter>("TrainingCenter")
    : connection.model<ITrainingCenter>("TrainingCenter", trainingCenterSchema);
}

export function getCounterModel(connection: Connection): CounterModel {
  return connection.modelNames().includes("Counter")
    ? connection.model<ICounter>("Counter")
    : connection.model<ICounter>("Counter", counterSchema);
}

export const TRAINING_CENTER_SEQUENCE = "training_center";
