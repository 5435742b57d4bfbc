import type { StageEvent, StageName } from '../../shared/types';
import { errorMessage } from '../obs/logger';

export type StageEventSender = (event: StageEvent) => void;

const nowIso = () => new Date().toISOString();

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender) => ({
  start: (payload?: { message?: string; data?: unknown }) => {
    send({ runId, stage, status: 'start', message: payload?.message, data: payload?.data, ts: nowIso() });
  },
  success: (payload?: { message?: string; data?: unknown }) => {
    send({ runId, stage, status: 'success', message: payload?.message, data: payload?.data, ts: nowIso() });
  },
  failure: (error: unknown, options?: { data?: unknown }) => {
    const message = errorMessage(error);
    send({ runId, stage, status: 'failure', message, data: options?.data ?? { error: message }, ts: nowIso() });
  },
});
