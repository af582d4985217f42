import type { Sleep } from './types';

export const sleep: Sleep = ms => new Promise<void>(resolve => setTimeout(resolve, ms));
