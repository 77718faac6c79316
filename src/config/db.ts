// src/config/db.ts
import mongoose, { Connection } from "mongoose";
import { getCounterModel, getTrainingCenterModel } from "../models/TrainingCenter";

/**
 * Opens the one connection the process uses and builds the indexes
 * (notably the unique center_code index) before any request is served.
 */
const connectDB = async (uri: string): Promise<Connection> => {
  const connection = await mongoose.createConnection(uri).asPromise();
  console.log("✅ MongoDB connected");

  await Promise.all([
    getTrainingCenterModel(connection).init(),
    getCounterModel(connection).init(),
  ]);
  console.log("[DB] Indexes ready");

  return connection;
};

export async function disconnectDB(connection: Connection): Promise<void> {
  await connection.close();
  console.log("[DB] MongoDB connection closed");
}

export default connectDB;
