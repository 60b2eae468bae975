import { SchedulerRegistry } from '@nestjs/schedule';
import { PipelineHarness, createPipeline, variant, videoAsset } from '../../test/fakes';
import { COMPLETION_POLLER_INTERVAL, CompletionPollerService } from './completion-poller.service';
import { userOwner } from './interfaces/owner.interface';
import * as messages from './messages';

describe('CompletionPollerService', () => {
  const alice = userOwner(7);
  let h: PipelineHarness;
  let schedulerRegistry: SchedulerRegistry;
  let poller: CompletionPollerService;

  beforeEach(async () => {
    h = createPipeline({ CHECK_INTERVAL_SECONDS: 15 });
    schedulerRegistry = new SchedulerRegistry();
    poller = new CompletionPollerService(h.config, schedulerRegistry, h.registry, h.coordinator, h.processing);
    await h.coordinator.submit(alice, videoAsset());
  });

  afterEach(() => {
    poller.onModuleDestroy();
    jest.restoreAllMocks();
  });

  it('registers its interval at bootstrap and removes it on destroy', () => {
    poller.onApplicationBootstrap();
    expect(schedulerRegistry.doesExist('interval', COMPLETION_POLLER_INTERVAL)).toBe(true);

    poller.onModuleDestroy();
    expect(schedulerRegistry.doesExist('interval', COMPLETION_POLLER_INTERVAL)).toBe(false);
  });

  it('leaves unfinished jobs alone', async () => {
    const summary = await poller.sweep();

    expect(summary).toEqual({ checked: 1, timedOut: 0, completed: 0, stale: 0, probeErrors: 0 });
    expect(h.processing.probed).toEqual(['parked-staged-1']);
    expect(h.registry.has('staged-1')).toBe(true);
  });

  it('hands finished jobs to the completion handler', async () => {
    h.processing.complete('parked-staged-1', [variant('v-720', 720), variant('v-480', 480)]);

    const summary = await poller.sweep();

    expect(summary).toMatchObject({ checked: 1, completed: 1 });
    expect(h.delivery.deliveries).toEqual([
      { userId: 7, variants: [variant('v-720', 720), variant('v-480', 480)] },
    ]);
    expect(h.registry.size).toBe(0);
    expect(h.ledger.count(alice)).toBe(0);
  });

  it('expires a job past its deadline without probing it', async () => {
    const job = h.registry.get('staged-1');
    expect(job).toBeDefined();
    if (!job) return;
    h.processing.complete('parked-staged-1', [variant('v-720', 720)]);
    jest.spyOn(Date, 'now').mockReturnValue(job.submittedAt.getTime() + 3_601_000);

    const summary = await poller.sweep();

    expect(summary).toEqual({ checked: 1, timedOut: 1, completed: 0, stale: 0, probeErrors: 0 });
    expect(h.processing.probed).toEqual([]);
    expect(h.delivery.deliveries).toEqual([]);
    expect(h.delivery.noticesFor(7)).toContain(messages.PROCESSING_TIMEOUT(3_601_000 / 60_000));
    expect(h.ledger.count(alice)).toBe(0);
  });

  it('keeps the job when the probe fails', async () => {
    h.processing.failProbe = true;

    const summary = await poller.sweep();

    expect(summary).toMatchObject({ checked: 1, probeErrors: 1 });
    expect(h.registry.has('staged-1')).toBe(true);
    expect(h.ledger.count(alice)).toBe(1);
  });

  it('drops a probe result for a job cancelled while it was being probed', async () => {
    jest.spyOn(h.processing, 'probeCompletion').mockImplementation(async () => {
      await h.coordinator.cancel(alice);
      return [variant('v-720', 720)];
    });

    const summary = await poller.sweep();

    expect(summary).toMatchObject({ checked: 1, stale: 1, completed: 0 });
    expect(h.delivery.deliveries).toEqual([]);
    expect(h.ledger.count(alice)).toBe(0);
    expect(h.ledger.entries()).toEqual([]);
  });
});
