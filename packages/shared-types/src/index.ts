export type * from './player-stats';
