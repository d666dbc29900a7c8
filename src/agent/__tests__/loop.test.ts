/**
 * Research loop tests
 */

import { describe, expect, it } from 'vitest';
import { groundedTrace, prematureTrace, spyLogger } from '../../__tests__/fixtures.js';
import type { Constraint } from '../../behavior/modifier.js';
import { defaultConfig, parseConfig } from '../../config.js';
import { TraceMalformedError } from '../../errors.js';
import { silentLogger } from '../../logger.js';
import { InMemoryMistakeStorage } from '../../mistakes/storage.js';
import { MistakeStore } from '../../mistakes/store.js';
import type { CorpusDocument } from '../../tools/search.js';
import type { MistakeStoreFile } from '../../mistakes/types.js';
import type { PlannedStep, Trace } from '../../trace/types.js';
import { ResearchLoop } from '../loop.js';
import { autoLearningRate, createResearchLoop, resolveMistakeRate } from '../setup.js';
import type { Execution, Executor, Planner } from '../types.js';

class RecordingPlanner implements Planner {
  readonly received: Constraint[][] = [];

  constructor(private readonly steps: PlannedStep[]) {}

  async plan(_question: string, constraints: Constraint[]): Promise<PlannedStep[]> {
    this.received.push(constraints);
    return this.steps;
  }
}

class FixedExecutor implements Executor {
  constructor(private readonly execution: Execution) {}

  async execute(): Promise<Execution> {
    return this.execution;
  }
}

/** Rejects exactly one write, counted from 1. */
class FailingWriteStorage extends InMemoryMistakeStorage {
  private attempts = 0;

  constructor(private readonly failingWrite: number) {
    super();
  }

  override async write(file: MistakeStoreFile): Promise<void> {
    this.attempts += 1;
    if (this.attempts === this.failingWrite) {
      throw new Error('disk full');
    }
    await super.write(file);
  }
}

/** Failed search: yields TOOL_SKIPPED and UNSUPPORTED_CLAIM. */
function failedSearchTrace(): Trace {
  return {
    question: 'Who invented the telephone?',
    plan_steps: [],
    executed_steps: [{ tool: 'search', succeeded: false, output: null, error: 'timeout' }],
    final_answer: 'Bell',
  };
}

const CORPUS: CorpusDocument[] = [
  {
    id: 'france-capital',
    title: 'Paris',
    content: 'Paris is the capital and largest city of France. It sits on the Seine.',
  },
  { id: 'tokyo', title: 'Tokyo', content: 'Tokyo is the capital of Japan.' },
];

async function memoryStore(storage = new InMemoryMistakeStorage()): Promise<MistakeStore> {
  return MistakeStore.open(storage, { logger: silentLogger });
}

function prematureLoop(store: MistakeStore, logger = silentLogger) {
  const trace = prematureTrace();
  const planner = new RecordingPlanner(trace.plan_steps);
  const loop = new ResearchLoop({
    store,
    planner,
    executor: new FixedExecutor({ executed_steps: [], final_answer: trace.final_answer }),
    logger,
  });
  return { loop, planner };
}

describe('ResearchLoop', () => {
  it('records a successful run without learning anything', async () => {
    const store = await memoryStore();
    const trace = groundedTrace();
    const loop = new ResearchLoop({
      store,
      planner: new RecordingPlanner(trace.plan_steps),
      executor: new FixedExecutor({ executed_steps: trace.executed_steps, final_answer: trace.final_answer }),
      logger: silentLogger,
    });

    const result = await loop.run(trace.question);

    expect(result.verdict.score).toBe(1);
    expect(result.mistakes).toEqual([]);
    expect(result.learned).toBe(false);
    expect(result.answer).toBe('The capital of France is Paris.');
    expect(store.getStats()).toMatchObject({ total_runs: 1, successful_runs: 1, success_rate: 1 });
  });

  it('hands learned constraints to the planner once a mistake recurs', async () => {
    const store = await memoryStore();
    const { loop, planner } = prematureLoop(store);

    await loop.run('What is the capital of France?');
    await loop.run('What is the capital of France?');
    const third = await loop.run('What is the capital of France?');

    expect(planner.received.map((constraints) => constraints.length)).toEqual([0, 0, 1]);
    expect(third.constraints[0]).toEqual({
      text: 'NEVER answer without using a research tool first',
      priority: 2,
      identity_key: 'PREMATURE_ANSWER:',
      mistake_type: 'PREMATURE_ANSWER',
    });
    expect(store.get('PREMATURE_ANSWER:')?.frequency).toBe(3);
  });

  it('returns the answer when learning cannot be saved', async () => {
    const storage = new InMemoryMistakeStorage();
    const store = await memoryStore(storage);
    const logger = spyLogger();
    const { loop } = prematureLoop(store, logger);
    storage.failWrites = new Error('disk full');

    const result = await loop.run('What is the capital of France?');

    expect(result.answer).toBe('The capital of France is Paris.');
    expect(result.learned).toBe(false);
    expect(result.mistakes.map((m) => m.identity_key)).toEqual(['PREMATURE_ANSWER:']);
    expect(result.persistence_error).toBe('Could not save mistake store at memory://mistakes: disk full');
    expect(logger.warn).toHaveBeenCalledWith(
      'Learning could not be saved for this run: Could not save mistake store at memory://mistakes: disk full',
    );
    expect(store.getStats().total_runs).toBe(0);
    expect(store.size).toBe(0);
  });

  it('saves nothing from a run whose learning write fails', async () => {
    const storage = new FailingWriteStorage(1);
    const store = await memoryStore(storage);
    const { loop } = prematureLoop(store);

    const assessment = await loop.assess(failedSearchTrace());

    expect(assessment.mistakes.map((m) => m.identity_key)).toEqual(['TOOL_SKIPPED:search', 'UNSUPPORTED_CLAIM:']);
    expect(assessment.persistence_error).toBe('Could not save mistake store at memory://mistakes: disk full');
    expect(await storage.read()).toBeNull();
    expect(store.size).toBe(0);
    expect(store.getStats().total_runs).toBe(0);
  });

  it('keeps mistake counts and run count in step when a later run fails to save', async () => {
    const storage = new FailingWriteStorage(2);
    const store = await memoryStore(storage);
    const { loop } = prematureLoop(store);

    const first = await loop.assess(failedSearchTrace());
    const second = await loop.assess(failedSearchTrace());

    expect(first.learned).toBe(true);
    expect(second.learned).toBe(false);

    const reopened = await memoryStore(new InMemoryMistakeStorage(await storage.read()));
    expect(reopened.list().map((m) => [m.identity_key, m.frequency])).toEqual([
      ['TOOL_SKIPPED:search', 1],
      ['UNSUPPORTED_CLAIM:', 1],
    ]);
    expect(reopened.getStats().total_runs).toBe(1);
    expect(store.snapshot()).toEqual(reopened.snapshot());
  });

  describe('assess', () => {
    it('rejects a malformed trace before scoring or recording it', async () => {
      const storage = new InMemoryMistakeStorage();
      const store = await memoryStore(storage);
      const { loop } = prematureLoop(store);

      await expect(
        loop.assess({
          question: 'What is new?',
          plan_steps: [],
          executed_steps: [{ tool: 'browser', succeeded: true, output: 'page' }],
          final_answer: 'Nothing',
        }),
      ).rejects.toBeInstanceOf(TraceMalformedError);
      expect(storage.writes).toBe(0);
      expect(store.getStats().total_runs).toBe(0);
    });

    it('scores without writing when learning is off', async () => {
      const storage = new InMemoryMistakeStorage();
      const store = await memoryStore(storage);
      const { loop } = prematureLoop(store);

      const assessment = await loop.assess(prematureTrace(), { learn: false });

      expect(assessment.mistakes).toHaveLength(1);
      expect(assessment.learned).toBe(false);
      expect(storage.writes).toBe(0);
    });
  });
});

describe('createResearchLoop', () => {
  it('answers from the corpus when the agent makes no mistakes', async () => {
    const store = await memoryStore();
    const loop = await createResearchLoop(defaultConfig(), {
      store,
      mistakeRate: 0,
      corpus: CORPUS,
      logger: silentLogger,
    });

    const result = await loop.run('What is the capital of France?');

    expect(result.plan.map((step) => step.tool)).toEqual(['search', 'summarize', undefined]);
    expect(result.trace.executed_steps.map((step) => step.tool)).toEqual(['search', 'summarize']);
    expect(result.answer).toBe('Paris is the capital and largest city of France. It sits on the Seine.');
    expect(result.verdict.score).toBe(1);
    expect(result.mistakes).toEqual([]);
    expect(store.getStats()).toMatchObject({ total_runs: 1, successful_runs: 1 });
  });

  it('switches to a research plan after repeated premature answers', async () => {
    const store = await memoryStore();
    const loop = await createResearchLoop(defaultConfig(), {
      store,
      mistakeRate: 1,
      random: () => 0,
      corpus: CORPUS,
      logger: silentLogger,
    });

    const first = await loop.run('What is the capital of France?');
    await loop.run('What is the capital of France?');
    const third = await loop.run('What is the capital of France?');

    expect(first.plan).toHaveLength(1);
    expect(first.mistakes.map((m) => m.identity_key)).toEqual(['PREMATURE_ANSWER:']);
    expect(third.constraints.map((c) => c.text)).toEqual(['NEVER answer without using a research tool first']);
    expect(third.plan).toHaveLength(3);
  });
});

describe('auto-learning mistake rate', () => {
  it.each([
    [0, 0.6],
    [2, 0.6],
    [3, 0.3],
    [4, 0.3],
    [5, 0],
    [40, 0],
  ])('after %i run(s) the rate is %s', (totalRuns, rate) => {
    expect(autoLearningRate(totalRuns)).toBe(rate);
  });

  it('follows the schedule only for a zero configured rate with auto-learning on', () => {
    expect(resolveMistakeRate(defaultConfig(), 0)).toBe(0.6);
    expect(resolveMistakeRate(defaultConfig(), 0, 0)).toBe(0);
    expect(resolveMistakeRate(parseConfig({ agent: { mistakeRate: 0.25 } }), 0)).toBe(0.25);
    expect(resolveMistakeRate(parseConfig({ agent: { autoLearning: false } }), 0)).toBe(0);
  });

  it('cuts corners on a fresh store and stops once the schedule ends', async () => {
    const fresh = await createResearchLoop(defaultConfig(), {
      store: await memoryStore(),
      random: () => 0,
      corpus: CORPUS,
      logger: silentLogger,
    });
    expect((await fresh.run('What is the capital of France?')).plan).toHaveLength(1);

    const seasoned = await createResearchLoop(defaultConfig(), {
      store: await memoryStore(
        new InMemoryMistakeStorage({ run_stats: { total_runs: 5, successful_runs: 5 } }),
      ),
      random: () => 0,
      corpus: CORPUS,
      logger: silentLogger,
    });
    expect((await seasoned.run('What is the capital of France?')).plan).toHaveLength(3);
  });
});
