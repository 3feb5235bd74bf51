/**
 * GRP-02: Group Visibility
 *
 * Public and private groups are visible to everyone; only members see
 * the member list. Secret groups do not exist for non-members: they are
 * left out of listings and answer 404.
 */

import { describe, it, expect } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { addMember, createGroup, registerUser } from '../../fixtures';

interface GroupBody {
  id: string;
  members?: unknown[];
}

describe('GRP-02: Group Visibility', () => {
  it('should hide a secret group from non-members', async () => {
    const owner = await registerUser('Owner');
    const outsider = await registerUser('Outsider');
    const secret = await createGroup(owner, { name: 'Hidden', type: 'secret' });

    const response = await httpClient.get<ErrorResponse>(`/api/groups/${secret.id}`, outsider.auth);

    expect(response.status).toBe(404);
    expect(response.data.error_description).toBe('Group not found');
  });

  it('should leave secret groups out of a non-member listing', async () => {
    const owner = await registerUser('Owner');
    const outsider = await registerUser('Outsider');
    const open = await createGroup(owner, { name: 'Open', type: 'public' });
    const closed = await createGroup(owner, { name: 'Closed', type: 'private' });
    await createGroup(owner, { name: 'Hidden', type: 'secret' });

    const response = await httpClient.get<GroupBody[]>('/api/groups', outsider.auth);

    expect(response.status).toBe(200);
    expect(response.data.map((g) => g.id).sort()).toEqual([open.id, closed.id].sort());
  });

  it('should show a secret group to its members', async () => {
    const owner = await registerUser('Owner');
    const member = await registerUser('Member');
    const secret = await createGroup(owner, { type: 'secret' });
    await addMember(owner, secret.id, member.id);

    const listing = await httpClient.get<GroupBody[]>('/api/groups', member.auth);
    const detail = await httpClient.get<GroupBody>(`/api/groups/${secret.id}`, member.auth);

    expect(listing.data.map((g) => g.id)).toEqual([secret.id]);
    expect(detail.status).toBe(200);
    expect(detail.data.members).toHaveLength(2);
  });

  it('should show a private group without its members to outsiders', async () => {
    const owner = await registerUser('Owner');
    const outsider = await registerUser('Outsider');
    const group = await createGroup(owner, { type: 'private' });

    const detail = await httpClient.get<GroupBody>(`/api/groups/${group.id}`, outsider.auth);
    const members = await httpClient.get<ErrorResponse>(`/api/groups/${group.id}/members`, outsider.auth);

    expect(detail.status).toBe(200);
    expect(detail.data.members).toBeUndefined();
    expect(members.status).toBe(403);
  });
});
