import { describe, expect, it, vi } from 'vitest';
import {
  NoEligibleQuestionError,
  QuestionSelector,
  chooseNextQuestion,
  type Question
} from '@question-rotation/core';

const pool = (...ids: string[]): Question[] => ids.map(id => ({ questionId: id, content: `content of ${id}` }));

describe('chooseNextQuestion', () => {
  it('walks the pool in id order and wraps after exhausting it', () => {
    const eligible = pool('Q3', 'Q1', 'Q2');
    const history: string[] = [];
    const picks: string[] = [];

    for (let cycle = 0; cycle < 5; cycle += 1) {
      const next = chooseNextQuestion('R1', eligible, history);
      picks.push(next.questionId);
      history.push(next.questionId);
    }

    expect(picks).toEqual(['Q1', 'Q2', 'Q3', 'Q1', 'Q2']);
  });

  it('returns the question with its content', () => {
    expect(chooseNextQuestion('R1', pool('Q1', 'Q2'), [])).toEqual({
      questionId: 'Q1',
      content: 'content of Q1'
    });
  });

  it('skips the first question of a fresh pass when it was just assigned', () => {
    const next = chooseNextQuestion('R1', pool('Q1', 'Q2', 'Q3'), ['Q2', 'Q3', 'Q1']);

    expect(next.questionId).toBe('Q2');
  });

  it('always returns the only eligible question', () => {
    const next = chooseNextQuestion('R1', pool('Q7'), ['Q7', 'Q7']);

    expect(next.questionId).toBe('Q7');
  });

  it('throws when the region has no eligible questions', () => {
    expect(() => chooseNextQuestion('R1', [], ['Q1'])).toThrow(NoEligibleQuestionError);
    expect(() => chooseNextQuestion('R1', [], [])).toThrow('No eligible question for region R1');
  });

  it('ignores history entries that are no longer eligible', () => {
    const next = chooseNextQuestion('R1', pool('Q1', 'Q2'), ['Q1', 'Q9']);

    expect(next.questionId).toBe('Q2');
  });

  it('picks up a question that became eligible mid-pass', () => {
    const next = chooseNextQuestion('R1', pool('Q1', 'Q2', 'Q3', 'Q4'), ['Q1', 'Q2', 'Q3']);

    expect(next.questionId).toBe('Q4');
  });

  it('treats duplicate eligibility rows as one question', () => {
    const eligible = [...pool('Q2', 'Q1'), ...pool('Q1')];

    expect(chooseNextQuestion('R1', eligible, []).questionId).toBe('Q1');
    expect(chooseNextQuestion('R1', eligible, ['Q1']).questionId).toBe('Q2');
    expect(chooseNextQuestion('R1', eligible, ['Q1', 'Q2']).questionId).toBe('Q1');
  });

  it('orders ids by code unit rather than locale', () => {
    const next = chooseNextQuestion('R1', pool('b', 'B', 'a'), []);

    expect(next.questionId).toBe('B');
  });
});

describe('QuestionSelector', () => {
  it('loads the pool and history for the region', async () => {
    const store = {
      listEligibleQuestions: vi.fn().mockResolvedValue(pool('Q1', 'Q2', 'Q3')),
      getAssignmentHistory: vi.fn().mockResolvedValue(['Q1'])
    };
    const selector = new QuestionSelector(store);

    const next = await selector.selectNext('R1');

    expect(next.questionId).toBe('Q2');
    expect(store.listEligibleQuestions).toHaveBeenCalledWith('R1');
    expect(store.getAssignmentHistory).toHaveBeenCalledWith('R1');
  });
});
