export { LifecycleService, offerTotal } from './service.js';
export type { LifecycleDependencies, LifecycleOptions, StaleOffer, TransitionOptions } from './service.js';
export { DeadlineSweeper } from './sweeper.js';
export type { DeadlineSweeperOptions, SweepResult } from './sweeper.js';
export * from './schemas.js';
export {
  INSTALLATION_TRANSITIONS,
  LEAD_TRANSITIONS,
  OFFER_TRANSITIONS,
  canCreateOffer,
  resolveTransition,
} from './transitions.js';
export type { Audience, InstallationEvent, LeadEvent, OfferEvent, SideEffect, TransitionRule } from './transitions.js';
