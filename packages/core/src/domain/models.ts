import { z } from 'zod';

export const RegionIdSchema = z.string().trim().min(1).max(128);

export const RegionSchema = z.object({
  regionId: RegionIdSchema,
  name: z.string().min(1)
});

export type Region = z.infer<typeof RegionSchema>;

export const QuestionSchema = z.object({
  questionId: z.string().min(1),
  content: z.string().min(1)
});

export type Question = z.infer<typeof QuestionSchema>;

export interface Eligibility {
  regionId: string;
  questionId: string;
}

export interface Cycle {
  cycleId: number;
  startTime: Date;
  endTime: Date;
  active: boolean;
}

export interface Assignment {
  cycleId: number;
  regionId: string;
  questionId: string;
  content: string;
}

export const QuestionViewSchema = z.object({
  regionId: z.string(),
  questionId: z.string(),
  content: z.string(),
  cycleId: z.number().int().positive(),
  cycleEndsAt: z.string().datetime()
});

export type QuestionView = z.infer<typeof QuestionViewSchema>;

export function toQuestionView(assignment: Assignment, cycle: Pick<Cycle, 'endTime'>): QuestionView {
  return {
    regionId: assignment.regionId,
    questionId: assignment.questionId,
    content: assignment.content,
    cycleId: assignment.cycleId,
    cycleEndsAt: cycle.endTime.toISOString()
  };
}

/** Whole seconds left in the cycle at `now`; zero or negative once the cycle is over. */
export function remainingTtlSeconds(cycle: Pick<Cycle, 'endTime'>, now: Date): number {
  return Math.ceil((cycle.endTime.getTime() - now.getTime()) / 1000);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
