import { storage as defaultStorage, type IStorage } from "../storage";
import { createLogger } from "../utils/logger";
import { getInsightsScheduler, type InsightsScheduler } from "./insightsScheduler";

const logger = createLogger('UserData');

export interface UserDeletionOptions {
  storage?: IStorage;
  scheduler?: Pick<InsightsScheduler, 'cancelUserEvaluation' | 'withUserDeletion'>;
}

/**
 * Remove everything held for a user: metric records, ingestion jobs, insight
 * results and the profile. The scheduler starts no new cycle for the user
 * until the delete resolves, and a running cycle is aborted and allowed to
 * settle first so it cannot write results after the delete.
 */
export async function deleteUserData(userId: string, options: UserDeletionOptions = {}): Promise<void> {
  const storage = options.storage ?? defaultStorage;
  const scheduler = options.scheduler ?? getInsightsScheduler();

  await scheduler.withUserDeletion(userId, async () => {
    const cancelled = await scheduler.cancelUserEvaluation(userId);
    if (cancelled) {
      logger.info(`Aborted running evaluation before deleting user ${userId}`);
    }
    await storage.deleteUserData(userId);
  });
  logger.info(`Deleted all data for user ${userId}`);
}
