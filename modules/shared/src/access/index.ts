/**
 * Social Events API - Access Control Module
 *
 * @module access
 */

export { can, assertCan, groupFacts, loadFacts, isAllowed } from './capabilities';
export type { Action, AccessFacts, AccessTarget, GroupFacts, EventFacts } from './capabilities';
export { openEvent, ownedBy } from './resources';
export type { EventAccess } from './resources';
