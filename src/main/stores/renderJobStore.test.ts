import { describe, it, expect, beforeEach } from 'vitest';
import { renderJobStore } from './renderJobStore';

describe('renderJobStore', () => {
  beforeEach(() => {
    renderJobStore.getState().reset();
  });

  it('starts idle with no event to report', () => {
    const state = renderJobStore.getState();
    expect(state.status).toBe('idle');
    expect(state.toEvent()).toBeNull();
  });

  it('tracks progress against the total duration', () => {
    const store = renderJobStore.getState();
    store.startJob('job-1', 40);
    store.reportProgress(10);

    expect(renderJobStore.getState().toEvent()).toEqual({
      jobId: 'job-1',
      status: 'processing',
      percent: 25,
      currentSeconds: 10,
      etaSeconds: 30,
      errorMessage: undefined,
    });
  });

  it('caps progress at 100 percent', () => {
    const store = renderJobStore.getState();
    store.startJob('job-1', 10);
    store.reportProgress(12);

    expect(renderJobStore.getState().percent).toBe(100);
    expect(renderJobStore.getState().etaSeconds).toBe(0);
  });

  it('ignores progress once the job has finished', () => {
    const store = renderJobStore.getState();
    store.startJob('job-1', 20);
    store.complete();
    store.reportProgress(5);

    const state = renderJobStore.getState();
    expect(state.status).toBe('complete');
    expect(state.percent).toBe(100);
    expect(state.currentSeconds).toBe(20);
  });

  it('records failures and cancellation', () => {
    const store = renderJobStore.getState();
    store.startJob('job-1', 20);
    store.fail('ffmpeg exited with code 1');
    expect(renderJobStore.getState().status).toBe('error');
    expect(renderJobStore.getState().errorMessage).toBe('ffmpeg exited with code 1');

    store.startJob('job-2', 20);
    expect(renderJobStore.getState().errorMessage).toBeUndefined();
    store.cancel();
    expect(renderJobStore.getState().status).toBe('cancelled');
  });

  it('notifies subscribers', () => {
    const seen: number[] = [];
    const unsubscribe = renderJobStore.subscribe((state) => seen.push(state.percent));
    const store = renderJobStore.getState();
    store.startJob('job-1', 4);
    store.reportProgress(1);
    store.reportProgress(2);
    unsubscribe();
    store.reportProgress(3);

    expect(seen).toEqual([0, 25, 50]);
  });
});
