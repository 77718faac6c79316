// src/lib/trainingCenterStore.ts
import { ClientSession, Connection } from "mongoose";
import {
  CounterModel,
  ITrainingCenter,
  TRAINING_CENTER_SEQUENCE,
  TrainingCenterModel,
  getCounterModel,
  getTrainingCenterModel,
  nowInSeconds,
} from "../models/TrainingCenter";
import { StoreError } from "../middleware/errorHandler";
import { splitCourses } from "./trainingCenterSerializer";
import type {
  NewTrainingCenter,
  TrainingCenterFilterKey,
  TrainingCenterFilters,
  TrainingCenterRecord,
} from "../types/trainingCenter";

export const FILTER_KEYS: readonly TrainingCenterFilterKey[] = ["city", "state", "pincode"];

export interface TrainingCenterStore {
  findByCode(code: string): Promise<TrainingCenterRecord | null>;
  /** Assigns id and created_on. Rejects with StoreError; nothing is written on failure. */
  insert(record: NewTrainingCenter): Promise<TrainingCenterRecord>;
  /** Exact, case-sensitive AND of the given filters, store order, no paging. */
  list(filters: TrainingCenterFilters): Promise<TrainingCenterRecord[]>;
}

/** Keeps only the filter keys that were actually given. */
export function activeFilters(filters: TrainingCenterFilters): TrainingCenterFilters {
  const active: TrainingCenterFilters = {};
  for (const key of FILTER_KEYS) {
    const value = filters[key];
    if (value !== undefined) active[key] = value;
  }
  return active;
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

function toRecord(doc: ITrainingCenter): TrainingCenterRecord {
  return {
    id: doc.id,
    center_name: doc.center_name,
    center_code: doc.center_code,
    detailed_address: doc.detailed_address,
    city: doc.city,
    state: doc.state,
    pincode: doc.pincode,
    student_capacity: doc.student_capacity ?? null,
    courses_offered: splitCourses(doc.courses_offered),
    created_on: doc.created_on,
    contact_email: doc.contact_email ?? null,
    contact_phone: doc.contact_phone,
  };
}

/**
 * MongoDB-backed store. The connection is opened once in server.ts and
 * passed in; transactions need the server to run as a replica set.
 */
export class MongoTrainingCenterStore implements TrainingCenterStore {
  private readonly centers: TrainingCenterModel;
  private readonly counters: CounterModel;

  constructor(private readonly connection: Connection) {
    this.centers = getTrainingCenterModel(connection);
    this.counters = getCounterModel(connection);
  }

  async findByCode(code: string): Promise<TrainingCenterRecord | null> {
    try {
      const doc = await this.centers.findOne({ center_code: code }).lean<ITrainingCenter>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw new StoreError(errorMessage(err));
    }
  }

  async insert(record: NewTrainingCenter): Promise<TrainingCenterRecord> {
    let session: ClientSession;
    try {
      session = await this.connection.startSession();
    } catch (err) {
      throw new StoreError(errorMessage(err));
    }

    try {
      session.startTransaction();

      const counter = await this.counters.findOneAndUpdate(
        { _id: TRAINING_CENTER_SEQUENCE },
        { $inc: { seq: 1 } },
        { new: true, upsert: true, session }
      );
      if (!counter) throw new Error("Could not allocate a training center id");

      const [created] = await this.centers.create(
        [{ ...record, id: counter.seq, created_on: nowInSeconds() }],
        { session }
      );

      await session.commitTransaction();
      return toRecord(created.toObject());
    } catch (err) {
      // abortTransaction throws if commit already went through
      if (session.inTransaction()) {
        await session
          .abortTransaction()
          .catch((abortErr: unknown) => console.error("[DB] Transaction abort failed:", errorMessage(abortErr)));
      }
      throw new StoreError(errorMessage(err));
    } finally {
      await session
        .endSession()
        .catch((endErr: unknown) => console.error("[DB] Ending session failed:", errorMessage(endErr)));
    }
  }

  async list(filters: TrainingCenterFilters): Promise<TrainingCenterRecord[]> {
    try {
      const docs = await this.centers.find(activeFilters(filters)).lean<ITrainingCenter[]>();
      return docs.map(toRecord);
    } catch (err) {
      throw new StoreError(errorMessage(err));
    }
  }
}
