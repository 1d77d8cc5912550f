export { createHistory } from './history';
export type { History, Timestamped } from './types';
