// src/server.ts
import { createApp } from "./app";
import connectDB, { disconnectDB } from "./config/db";
import config from "./config/config";
import { MongoTrainingCenterStore } from "./lib/trainingCenterStore";

const startServer = async () => {
  try {
    // 1. Connect to MongoDB; the connection is handed to the store, nothing global
    const connection = await connectDB(config.databaseURI);
    const store = new MongoTrainingCenterStore(connection);

    // 2. Capture the server instance
    const server = createApp(store).listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });

    // 3. Close HTTP first so no request sees a closed connection
    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down`);
      server.close(() => {
        disconnectDB(connection)
          .then(() => process.exit(0))
          .catch((error) => {
            console.error("Failed to close MongoDB connection:", error);
            process.exit(1);
          });
      });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
