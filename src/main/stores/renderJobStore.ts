import { createStore } from 'zustand/vanilla';
import { RenderProgressEvent, RenderStatus } from '../../types/commands';

interface RenderJobState {
  jobId: string | null;
  status: RenderStatus;
  percent: number;
  currentSeconds: number;
  totalSeconds: number;
  etaSeconds?: number;
  errorMessage?: string;

  startJob: (jobId: string, totalSeconds: number) => void;
  reportProgress: (currentSeconds: number) => void;
  complete: () => void;
  fail: (message: string) => void;
  cancel: () => void;
  reset: () => void;
  toEvent: () => RenderProgressEvent | null;
}

const idle = {
  jobId: null,
  status: 'idle' as const,
  percent: 0,
  currentSeconds: 0,
  totalSeconds: 0,
  etaSeconds: undefined,
  errorMessage: undefined,
};

export const renderJobStore = createStore<RenderJobState>((set, get) => ({
  ...idle,

  startJob: (jobId, totalSeconds) => {
    set({ ...idle, jobId, status: 'processing', totalSeconds: Math.max(0, totalSeconds) });
  },

  reportProgress: (currentSeconds) => {
    set((state) => {
      if (state.status !== 'processing') return state;
      const total = state.totalSeconds;
      const seconds = Math.max(0, currentSeconds);
      return {
        currentSeconds: seconds,
        percent: total > 0 ? Math.min(100, (seconds / total) * 100) : 0,
        etaSeconds: total > 0 ? Math.max(0, total - seconds) : undefined,
      };
    });
  },

  complete: () => {
    set((state) => ({
      status: 'complete',
      percent: 100,
      currentSeconds: state.totalSeconds,
      etaSeconds: 0,
    }));
  },

  fail: (message) => set({ status: 'error', errorMessage: message, etaSeconds: undefined }),

  cancel: () => set({ status: 'cancelled', etaSeconds: undefined }),

  reset: () => set({ ...idle }),

  toEvent: () => {
    const { jobId, percent, currentSeconds, etaSeconds, status, errorMessage } = get();
    if (!jobId) return null;
    return { jobId, percent, currentSeconds, etaSeconds, status, errorMessage };
  },
}));
