import { initTRPC, TRPCError } from "@trpc/server";
import { ZodError } from "zod";
import type { AcademicRecordsServices } from "@/server/services";
import type { Role } from "@/types/access";

export interface Session {
  user: {
    id: string;
    role: Role;
  };
}

interface CreateContextOptions {
  session: Session | null;
  services: AcademicRecordsServices;
}

/**
 * Authentication happens upstream; the caller hands over the resolved
 * session (or null) together with the wired services.
 */
export const createTRPCContext = (opts: CreateContextOptions) => {
  return {
    session: opts.session,
    services: opts.services,
  };
};

export type Context = ReturnType<typeof createTRPCContext>;

const t = initTRPC.context<Context>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError:
          error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const createTRPCRouter = t.router;
export const createCallerFactory = t.createCallerFactory;

const enforceUserIsAuthed = t.middleware(({ ctx, next }) => {
  if (!ctx.session) {
    throw new TRPCError({ code: "UNAUTHORIZED" });
  }
  return next({
    ctx: {
      session: ctx.session,
      role: ctx.session.user.role,
    },
  });
});

export const protectedProcedure = t.procedure.use(enforceUserIsAuthed);

export const studentProcedure = protectedProcedure.use(({ ctx, next }) => {
  const { role } = ctx;
  if (role.kind !== "STUDENT") {
    throw new TRPCError({ code: "FORBIDDEN", message: "Student access required" });
  }
  return next({ ctx: { role } });
});

export const instructorProcedure = protectedProcedure.use(({ ctx, next }) => {
  const { role } = ctx;
  if (role.kind !== "INSTRUCTOR") {
    throw new TRPCError({ code: "FORBIDDEN", message: "Instructor access required" });
  }
  return next({ ctx: { role } });
});

export const adminProcedure = protectedProcedure.use(({ ctx, next }) => {
  const { role } = ctx;
  if (role.kind !== "ADMIN") {
    throw new TRPCError({ code: "FORBIDDEN", message: "Administrator access required" });
  }
  return next({ ctx: { role } });
});
