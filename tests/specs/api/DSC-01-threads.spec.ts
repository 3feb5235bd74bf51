/**
 * DSC-01: Discussion Threads
 *
 * Validates thread creation in groups and events, the context rules of
 * the request, and who may list and delete threads.
 */

import { describe, it, expect } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { addMember, createEvent, createGroup, joinEvent, registerUser, type Created } from '../../fixtures';

interface ThreadBody {
  id: string;
  title: string;
  context: string;
  groupId?: string;
  eventId?: string;
  createdById: string;
}

describe('DSC-01: Discussion Threads', () => {
  it('should let a group member open a thread', async () => {
    const owner = await registerUser('Owner');
    const member = await registerUser('Member');
    const group = await createGroup(owner);
    await addMember(owner, group.id, member.id);

    const response = await httpClient.postJson<ThreadBody>(
      '/api/discussions',
      { title: 'Next hike', context: 'group', groupId: group.id },
      member.auth
    );

    expect(response.status).toBe(201);
    expect(response.data).toMatchObject({
      title: 'Next hike',
      context: 'group',
      groupId: group.id,
      createdById: member.id,
    });
    expect(response.data.eventId).toBeUndefined();
  });

  it('should forbid member threads when member posts are off', async () => {
    const owner = await registerUser('Owner');
    const member = await registerUser('Member');
    const group = await createGroup(owner, { allowMemberPosts: false });
    await addMember(owner, group.id, member.id);

    const byMember = await httpClient.postJson<ErrorResponse>(
      '/api/discussions',
      { title: 'Hello', context: 'group', groupId: group.id },
      member.auth
    );
    const byAdmin = await httpClient.postJson(
      '/api/discussions',
      { title: 'Announcements', context: 'group', groupId: group.id },
      owner.auth
    );

    expect(byMember.status).toBe(403);
    expect(byMember.data.error_description).toBe('Not permitted: group:post');
    expect(byAdmin.status).toBe(201);
  });

  it('should require the id that matches the context', async () => {
    const user = await registerUser();

    const response = await httpClient.postJson<ErrorResponse>(
      '/api/discussions',
      { title: 'Mixed', context: 'event', groupId: 'some-group' },
      user.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([
      { field: 'eventId', message: 'eventId is required when context is event' },
      { field: 'groupId', message: 'groupId is not allowed when context is event' },
    ]);
  });

  it('should keep event threads to people with access to the event', async () => {
    const organizer = await registerUser('Organizer');
    const guest = await registerUser('Guest');
    const stranger = await registerUser('Stranger');
    const event = await createEvent(organizer);
    await joinEvent(guest, event.id);

    const byGuest = await httpClient.postJson<Created>(
      '/api/discussions',
      { title: 'Parking', context: 'event', eventId: event.id },
      guest.auth
    );
    const byStranger = await httpClient.postJson<ErrorResponse>(
      '/api/discussions',
      { title: 'Spam', context: 'event', eventId: event.id },
      stranger.auth
    );
    const strangerRead = await httpClient.get<ErrorResponse>(`/api/discussions/${byGuest.data.id}`, stranger.auth);

    expect(byGuest.status).toBe(201);
    expect(byStranger.status).toBe(403);
    expect(strangerRead.status).toBe(403);
  });

  it('should list threads of one scope', async () => {
    const owner = await registerUser('Owner');
    const outsider = await registerUser('Outsider');
    const group = await createGroup(owner);
    const thread = await httpClient.postJson<Created>(
      '/api/discussions',
      { title: 'Welcome', context: 'group', groupId: group.id },
      owner.auth
    );

    const listing = await httpClient.get<ThreadBody[]>(`/api/discussions?groupId=${group.id}`, owner.auth);
    const outsiderListing = await httpClient.get<ErrorResponse>(`/api/discussions?groupId=${group.id}`, outsider.auth);
    const noScope = await httpClient.get<ErrorResponse>('/api/discussions', owner.auth);

    expect(listing.data.map((t) => t.id)).toEqual([thread.data.id]);
    expect(outsiderListing.status).toBe(403);
    expect(noScope.status).toBe(422);
    expect(noScope.data.errors).toEqual([
      { field: 'groupId', message: 'Exactly one of groupId or eventId is required' },
    ]);
  });

  it('should let only the creator or a moderator delete a thread', async () => {
    const owner = await registerUser('Owner');
    const author = await registerUser('Author');
    const bystander = await registerUser('Bystander');
    const group = await createGroup(owner);
    await addMember(owner, group.id, author.id);
    await addMember(owner, group.id, bystander.id);
    const thread = await httpClient.postJson<Created>(
      '/api/discussions',
      { title: 'Off topic', context: 'group', groupId: group.id },
      author.auth
    );

    const byBystander = await httpClient.delete<ErrorResponse>(`/api/discussions/${thread.data.id}`, bystander.auth);
    const byAdmin = await httpClient.delete(`/api/discussions/${thread.data.id}`, owner.auth);
    const after = await httpClient.get<ErrorResponse>(`/api/discussions/${thread.data.id}`, author.auth);

    expect(byBystander.status).toBe(403);
    expect(byBystander.data.error_description).toBe('Only the creator or a moderator may delete this thread');
    expect(byAdmin.status).toBe(204);
    expect(after.status).toBe(404);
    expect(after.data.error_description).toBe('Thread not found');
  });
});
