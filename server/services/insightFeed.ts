import type { InsightResult } from "@shared/schema";
import { INSIGHT_RULES, type InsightRule } from "../config/insightRules";
import { storage as defaultStorage, type IStorage } from "../storage";
import { effectCategoryResolver, rankInsightResults, selectTopInsights } from "./insightRanking";

export interface InsightFeedOptions {
  storage?: IStorage;
  rules?: readonly InsightRule[];
  limit?: number;
  maxPerCategory?: number;
}

/** The user's current insights, ranked and de-duplicated. */
export async function queryInsightFeed(userId: string, options: InsightFeedOptions = {}): Promise<InsightResult[]> {
  const storage = options.storage ?? defaultStorage;
  const results = await storage.getInsightResults(userId);
  const ranked = rankInsightResults(results);

  if (options.limit === undefined && options.maxPerCategory === undefined) {
    return ranked;
  }
  return selectTopInsights(ranked, {
    maxTotal: options.limit,
    maxPerCategory: options.maxPerCategory,
    categoryOf: effectCategoryResolver(options.rules ?? INSIGHT_RULES),
  });
}
