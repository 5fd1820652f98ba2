import { NoEligibleQuestionError } from '../domain/errors';
import type { Question } from '../domain/models';
import type { AssignmentStore } from '../ports/AssignmentStore';

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Round-robin over the eligible pool ordered by question id.
 *
 * History is replayed oldest first to find which questions the current pass has already
 * used; a pass ends once every eligible question has appeared in it. Within a pass the next
 * unused question after the most recent assignment wins. When a pass has just ended the
 * ordering restarts from the top, skipping only the previous question.
 */
export function chooseNextQuestion(
  regionId: string,
  eligible: readonly Question[],
  history: readonly string[]
): Question {
  const pool = dedupe(eligible).sort((a, b) => compareIds(a.questionId, b.questionId));
  if (pool.length === 0) {
    throw new NoEligibleQuestionError(regionId);
  }
  if (pool.length === 1) {
    return pool[0];
  }

  const poolIds = new Set(pool.map(question => question.questionId));
  const usedInPass = new Set<string>();
  for (const questionId of history) {
    if (!poolIds.has(questionId)) {
      continue;
    }
    usedInPass.add(questionId);
    if (usedInPass.size === pool.length) {
      usedInPass.clear();
    }
  }

  const previous = history.length > 0 ? history[history.length - 1] : undefined;

  if (previous === undefined || usedInPass.size === 0) {
    const first = pool[0];
    return first.questionId === previous ? pool[1] : first;
  }

  const start = pool.findIndex(question => compareIds(question.questionId, previous) > 0);
  const offset = start === -1 ? 0 : start;
  for (let step = 0; step < pool.length; step += 1) {
    const candidate = pool[(offset + step) % pool.length];
    if (!usedInPass.has(candidate.questionId)) {
      return candidate;
    }
  }

  // unreachable: an unfinished pass always leaves an unused question
  return pool[offset];
}

function dedupe(questions: readonly Question[]): Question[] {
  const byId = new Map<string, Question>();
  for (const question of questions) {
    if (!byId.has(question.questionId)) {
      byId.set(question.questionId, question);
    }
  }
  return Array.from(byId.values());
}

export class QuestionSelector {
  constructor(private readonly store: Pick<AssignmentStore, 'listEligibleQuestions' | 'getAssignmentHistory'>) {}

  async selectNext(regionId: string): Promise<Question> {
    const [eligible, history] = await Promise.all([
      this.store.listEligibleQuestions(regionId),
      this.store.getAssignmentHistory(regionId)
    ]);
    return chooseNextQuestion(regionId, eligible, history);
  }
}
