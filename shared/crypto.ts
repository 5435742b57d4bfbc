import { randomUUID } from 'node:crypto';

/** Identifier attached to every log line and stage event of one analysis. */
export const randomId = (): string => randomUUID();
