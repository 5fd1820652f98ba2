import { describe, expect, it } from 'vitest';
import { BatchWriteCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import {
  ConfigMissingError,
  CYCLE_DURATION_KEY,
  LookupService,
  QuestionSelector,
  RotationEngine,
  type RotationResult
} from '@question-rotation/core';
import {
  DynamoAssignmentStore,
  DynamoLookupCache,
  DynamoParameterStore,
  cycleSortKey
} from '@question-rotation/persistence-ddb';
import { FakeDynamo } from '../fixtures/fake-dynamo';
import { ManualClock } from '../fixtures/memory';

const ROTATION_TABLE = 'RotationTable';
const CONTROL_TABLE = 'ControlTable';

const setup = async (options: { configure?: boolean } = {}) => {
  const faults = { cachePush: false, transactions: 0 };
  const fake = new FakeDynamo({
    failWith: command => {
      if (faults.cachePush && command instanceof BatchWriteCommand) {
        return new Error('cache unavailable');
      }
      if (faults.transactions > 0 && command instanceof TransactWriteCommand) {
        faults.transactions -= 1;
        return new Error('Internal server error');
      }
      return undefined;
    }
  });
  const client = fake.asClient();
  const clock = new ManualClock('2024-03-01T00:00:00.000Z');
  const store = new DynamoAssignmentStore({ tableName: ROTATION_TABLE, client });
  const cache = new DynamoLookupCache({ tableName: CONTROL_TABLE, client, now: clock.now });
  const parameters = new DynamoParameterStore({ tableName: CONTROL_TABLE, client });

  await store.putRegion({ regionId: 'R1', name: 'North' });
  await store.putRegion({ regionId: 'R2', name: 'South' });
  for (const questionId of ['Q1', 'Q2', 'Q3', 'Q5']) {
    await store.putQuestion({ questionId, content: `content of ${questionId}` });
  }
  for (const questionId of ['Q1', 'Q2', 'Q3']) {
    await store.addEligibility('R1', questionId);
  }
  await store.addEligibility('R2', 'Q5');
  if (options.configure ?? true) {
    await parameters.putParameter(CYCLE_DURATION_KEY, '24h');
  }

  const newEngine = () =>
    new RotationEngine(store, new QuestionSelector(store), cache, parameters, { clock: clock.now });
  const lookup = new LookupService(store, cache, { clock: clock.now });

  return { fake, faults, clock, store, cache, engine: newEngine(), newEngine, lookup };
};

const questionFor = (result: RotationResult, regionId: string): string | undefined =>
  result.status === 'rotated'
    ? result.assignments.find(assignment => assignment.regionId === regionId)?.questionId
    : undefined;

describe('rotation and lookup against DynamoDB', () => {
  it('rotates R1 through its pool and fills the cache from the store mid-cycle', async () => {
    const { engine, lookup, clock, faults, fake, store } = await setup();
    const picks: Array<string | undefined> = [];

    picks.push(questionFor(await engine.rotate(), 'R1'));

    faults.cachePush = true;
    clock.set('2024-03-02T00:00:00.000Z');
    const second = await engine.rotate();
    picks.push(questionFor(second, 'R1'));
    expect(second).toMatchObject({ status: 'rotated', cachePushed: false });

    clock.set('2024-03-02T06:00:00.000Z');
    await expect(lookup.getCurrentQuestion('R1')).resolves.toEqual({
      regionId: 'R1',
      questionId: 'Q2',
      content: 'content of Q2',
      cycleId: 2,
      cycleEndsAt: '2024-03-03T00:00:00.000Z'
    });
    // 2024-03-03T00:00:00Z, eighteen hours after the lookup
    expect(fake.get(CONTROL_TABLE, 'LOOKUP#R1', 'CURRENT')).toMatchObject({ expiresAt: 1_709_424_000 });

    faults.cachePush = false;
    clock.set('2024-03-03T00:00:00.000Z');
    picks.push(questionFor(await engine.rotate(), 'R1'));
    clock.set('2024-03-04T00:00:00.000Z');
    picks.push(questionFor(await engine.rotate(), 'R1'));

    expect(picks).toEqual(['Q1', 'Q2', 'Q3', 'Q1']);
    await expect(store.getAssignmentHistory('R2')).resolves.toEqual(['Q5', 'Q5', 'Q5', 'Q5']);
  });

  it('serves the pushed assignment right after a rotation', async () => {
    const { engine, lookup, clock, fake } = await setup();
    await engine.rotate();
    clock.set('2024-03-02T00:00:01.000Z');
    await engine.rotate();
    const storeReads = fake.send.mock.calls.length;

    await expect(lookup.getCurrentQuestion('R2')).resolves.toMatchObject({ cycleId: 2, questionId: 'Q5' });
    // one Get on the cache entry, nothing from the rotation table
    expect(fake.send.mock.calls.length - storeReads).toBe(1);
  });

  it('stops serving the previous cycle once it ends even if the cache push failed', async () => {
    const { engine, lookup, clock, faults } = await setup();
    await engine.rotate();
    clock.set('2024-03-01T12:00:00.000Z');
    await expect(lookup.getCurrentQuestion('R1')).resolves.toMatchObject({ cycleId: 1 });

    faults.cachePush = true;
    clock.set('2024-03-02T00:00:03.000Z');
    await engine.rotate();

    await expect(lookup.getCurrentQuestion('R1')).resolves.toMatchObject({ cycleId: 2, questionId: 'Q2' });
  });

  it('lets exactly one of two concurrent rotations commit', async () => {
    const { newEngine, clock, fake } = await setup();
    await newEngine().rotate();
    clock.set('2024-03-02T00:00:00.000Z');

    const results = await Promise.all([newEngine().rotate(), newEngine().rotate()]);

    expect(results.map(result => result.status).sort()).toEqual(['conflict', 'rotated']);
    expect(fake.items(ROTATION_TABLE, 'CYCLE').map(item => item.sk)).toEqual([cycleSortKey(1), cycleSortKey(2)]);
    expect(fake.items(ROTATION_TABLE, 'ASSIGNMENT#R1')).toHaveLength(2);
  });

  it('leaves the active cycle untouched when the commit fails', async () => {
    const { engine, clock, faults, store, fake } = await setup();
    await engine.rotate();
    clock.set('2024-03-02T00:00:00.000Z');
    faults.transactions = 1;

    await expect(engine.rotate()).rejects.toThrow('Internal server error');
    await expect(store.getActiveCycle()).resolves.toMatchObject({ cycleId: 1 });
    expect(fake.get(ROTATION_TABLE, 'CYCLE', cycleSortKey(2))).toBeUndefined();
    expect(fake.get(ROTATION_TABLE, 'ASSIGNMENT#R1', cycleSortKey(2))).toBeUndefined();

    await expect(engine.rotate()).resolves.toMatchObject({ status: 'rotated', cycle: { cycleId: 2 } });
  });

  it('fails every tick loudly while a stray row blocks the next cycle', async () => {
    const { engine, clock, fake, store } = await setup();
    await engine.rotate();
    fake.seed(ROTATION_TABLE, [
      { pk: 'ASSIGNMENT#R2', sk: cycleSortKey(2), cycleId: 2, regionId: 'R2', questionId: 'Q5', content: 'x' }
    ]);

    for (const tick of ['2024-03-02T00:00:00.000Z', '2024-03-03T00:00:00.000Z']) {
      clock.set(tick);
      await expect(engine.rotate()).rejects.toMatchObject({
        name: 'RotationIntegrityError',
        cycleId: 2,
        conflictingKeys: ['ASSIGNMENT#R2/000000000002']
      });
    }

    await expect(store.getActiveCycle()).resolves.toMatchObject({ cycleId: 1 });
    expect(fake.get(ROTATION_TABLE, 'CYCLE', cycleSortKey(1))).toMatchObject({ active: true });
    expect(fake.get(ROTATION_TABLE, 'ASSIGNMENT#R1', cycleSortKey(2))).toBeUndefined();
  });

  it('refuses to rotate until the cycle duration is configured', async () => {
    const { engine, fake } = await setup({ configure: false });

    await expect(engine.rotate()).rejects.toBeInstanceOf(ConfigMissingError);
    expect(fake.items(ROTATION_TABLE, 'CYCLE')).toEqual([]);
  });
});
