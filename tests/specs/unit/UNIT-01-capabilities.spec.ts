/**
 * UNIT-01: Capability Decisions
 *
 * `can` is a pure function of the facts about actor and target; these
 * cases pin the role rules without touching storage.
 */

import { describe, it, expect } from 'vitest';
import { can, type AccessFacts, type EventFacts, type GroupFacts } from '@social-api/shared';

const ACTOR = 'actor-1';

function group(overrides: Partial<GroupFacts> = {}): GroupFacts {
  return { type: 'public', allowMemberPosts: true, allowMemberEvents: false, role: null, ...overrides };
}

function event(overrides: Partial<EventFacts> = {}): EventFacts {
  return { isPrivate: false, createdById: 'creator-1', isOrganizer: false, isParticipant: false, ...overrides };
}

function facts(parts: Omit<AccessFacts, 'actorId'>): AccessFacts {
  return { actorId: ACTOR, ...parts };
}

describe('UNIT-01: Capability Decisions', () => {
  describe('groups', () => {
    it('should hide secret groups from non-members only', () => {
      expect(can(facts({ group: group({ type: 'secret' }) }), 'group:view')).toBe(false);
      expect(can(facts({ group: group({ type: 'secret', role: 'member' }) }), 'group:view')).toBe(true);
      expect(can(facts({ group: group({ type: 'private' }) }), 'group:view')).toBe(true);
    });

    it('should reserve administration to admins', () => {
      for (const role of ['member', 'event-creator'] as const) {
        expect(can(facts({ group: group({ role }) }), 'group:manage-members')).toBe(false);
      }
      expect(can(facts({ group: group({ role: 'admin' }) }), 'group:manage-members')).toBe(true);
      expect(can(facts({ group: group({ role: 'admin' }) }), 'group:moderate')).toBe(true);
    });

    it('should let members create events only when the group allows it', () => {
      expect(can(facts({ group: group({ role: 'member' }) }), 'group:create-event')).toBe(false);
      expect(can(facts({ group: group({ role: 'member', allowMemberEvents: true }) }), 'group:create-event')).toBe(true);
      expect(can(facts({ group: group({ role: 'event-creator' }) }), 'group:create-event')).toBe(true);
      expect(can(facts({ group: group({ allowMemberEvents: true }) }), 'group:create-event')).toBe(false);
    });

    it('should let admins post even when member posts are off', () => {
      const closed = { allowMemberPosts: false };

      expect(can(facts({ group: group({ ...closed, role: 'member' }) }), 'group:post')).toBe(false);
      expect(can(facts({ group: group({ ...closed, role: 'admin' }) }), 'group:post')).toBe(true);
    });
  });

  describe('events', () => {
    it('should show private events to organizers, participants and group members', () => {
      const hidden = event({ isPrivate: true });

      expect(can(facts({ event: hidden }), 'event:view')).toBe(false);
      expect(can(facts({ event: event({ isPrivate: true, isParticipant: true }) }), 'event:view')).toBe(true);
      expect(can(facts({ event: hidden, group: group({ role: 'member' }) }), 'event:view')).toBe(true);
    });

    it('should let the creator or a group admin delete an event', () => {
      expect(can(facts({ event: event({ isOrganizer: true }) }), 'event:delete')).toBe(false);
      expect(can(facts({ event: event({ createdById: ACTOR }) }), 'event:delete')).toBe(true);
      expect(can(facts({ event: event(), group: group({ role: 'admin' }) }), 'event:delete')).toBe(true);
    });

    it('should limit event content to people involved in the event', () => {
      expect(can(facts({ event: event() }), 'event:access')).toBe(false);
      expect(can(facts({ event: event({ isParticipant: true }) }), 'event:access')).toBe(true);
      expect(can(facts({ event: event(), group: group({ role: 'member' }) }), 'event:access')).toBe(true);
    });

    it('should treat missing facts as not granted', () => {
      expect(can(facts({}), 'event:view')).toBe(false);
      expect(can(facts({}), 'group:view')).toBe(false);
    });
  });

  describe('owned resources', () => {
    it('should let the owner or an organizer modify', () => {
      expect(can(facts({ event: event(), ownerId: ACTOR }), 'resource:modify')).toBe(true);
      expect(can(facts({ event: event(), ownerId: 'someone-else' }), 'resource:modify')).toBe(false);
      expect(can(facts({ event: event({ isOrganizer: true }), ownerId: 'someone-else' }), 'resource:modify')).toBe(true);
    });
  });
});
