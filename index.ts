import express from "express";
import cors from "cors";
import connectDB from "./config/database";
import { config } from "./config/env";
import { createAuthenticator } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createAuthRouter } from "./routes/auth";
import { createLeaveRequestRouter } from "./routes/leaveRequests";
import { MongoLeaveRequestRepository } from "./services/leaveRequestRepository";
import { LeaveRequestService } from "./services/leaveRequestService";
import { MongoUserDirectory, type UserDirectory } from "./services/userDirectory";

export interface AppDependencies {
  directory: UserDirectory;
  leaveService: LeaveRequestService;
}

export function createApp({ directory, leaveService }: AppDependencies): express.Express {
  const app = express();
  const authenticate = createAuthenticator(directory);

  app.use(cors({
    origin: [...config.corsOrigins],
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
    optionsSuccessStatus: 200
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get("/api/ping", (_req, res) => {
    res.json({ message: config.pingMessage });
  });

  // Authentication routes
  app.use("/api/auth", createAuthRouter({ directory, authenticate }));

  // Leave request workflow
  app.use("/api/leave-requests", createLeaveRequestRouter({ leaveService, authenticate }));

  app.use("/api", notFoundHandler);
  app.use(errorHandler);

  return app;
}

export async function createServer(): Promise<express.Express> {
  await connectDB();

  const directory = new MongoUserDirectory();
  const leaveService = new LeaveRequestService({
    repository: new MongoLeaveRequestRepository(),
    directory,
  });

  return createApp({ directory, leaveService });
}
