import { adminRouter } from "./routers/admin";
import { gradingRouter } from "./routers/grading";
import { registrationRouter } from "./routers/registration";
import { createCallerFactory, createTRPCRouter } from "./trpc";

export const appRouter = createTRPCRouter({
  registration: registrationRouter,
  grading: gradingRouter,
  admin: adminRouter,
});

export type AppRouter = typeof appRouter;

export const createCaller = createCallerFactory(appRouter);
