import { Context, MiddlewareFn } from "grammy";
import { AuthorizationError } from "./errors/index.js";
import { logger } from "./utils.js";
import { validateTelegramUserId } from "./validation.js";

export interface AuthService {
  isAuthorized(userId: number): boolean;
}

export function createAuthService(authorizedUsers: readonly number[]): AuthService {
  const allowed = new Set(authorizedUsers);

  return {
    isAuthorized(userId: number): boolean {
      const authorized = allowed.has(userId);
      if (!authorized) {
        logger.warn(`Unauthorized access: ${userId}`);
      }
      return authorized;
    },
  };
}

/**
 * Drops updates from anyone outside the allow-list before any handler runs
 */
export function authMiddleware(authService: AuthService): MiddlewareFn<Context> {
  return async (ctx, next) => {
    const userId = validateTelegramUserId(ctx.from?.id);

    if (!userId.success || !authService.isAuthorized(userId.data)) {
      const error = new AuthorizationError(
        userId.success
          ? `Rejected update from ${userId.data}`
          : `Rejected update: ${userId.error}`,
        userId.success ? userId.data : undefined
      );
      logger.debug(error.message);
      await ctx.reply(error.userMessage);
      return;
    }

    await next();
  };
}
