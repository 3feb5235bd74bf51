/**
 * GRP-04: Group Deletion Cascade
 *
 * Deleting a group removes its memberships, its threads with their
 * messages, and its events with everything they own. Users are kept.
 */

import { describe, it, expect } from 'vitest';
import { currentTable, httpClient } from '../../support/api';
import { addMember, createEvent, createGroup, registerUser, type Created } from '../../fixtures';

describe('GRP-04: Group Deletion Cascade', () => {
  it('should remove everything the group owns', async () => {
    const owner = await registerUser('Owner');
    const member = await registerUser('Member');
    const group = await createGroup(owner);
    await addMember(owner, group.id, member.id);
    const event = await createEvent(owner, { groupId: group.id });

    const thread = await httpClient.postJson<Created>(
      '/api/discussions',
      { title: 'Route planning', context: 'group', groupId: group.id },
      member.auth
    );
    expect(thread.status).toBe(201);
    await httpClient.postJson(`/api/discussions/${thread.data.id}/messages`, { content: 'North ridge?' }, member.auth);

    const deleted = await httpClient.delete(`/api/groups/${group.id}`, owner.auth);
    expect(deleted.status).toBe(204);

    expect((await httpClient.get(`/api/events/${event.id}`, owner.auth)).status).toBe(404);
    expect((await httpClient.get(`/api/discussions/${thread.data.id}`, member.auth)).status).toBe(404);

    const memberships = await httpClient.get<unknown[]>('/api/groups', member.auth);
    expect(memberships.data).toEqual([]);

    // Two rows per user remain: the profile and the email marker
    expect(currentTable().size).toBe(4);
  });
});
