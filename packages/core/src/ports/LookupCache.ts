import type { QuestionView } from '../domain/models';

export interface LookupCache {
  get(regionId: string): Promise<QuestionView | null>;
  /** Replaces the entry for `view.regionId`. */
  put(view: QuestionView, ttlSeconds: number): Promise<void>;
  putMany(views: QuestionView[], ttlSeconds: number): Promise<void>;
}
