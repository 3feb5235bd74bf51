/**
 * DSC-02: Messages and Replies
 *
 * Validates posting messages, replies that must stay inside their thread,
 * and the flat and tree views of a thread.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { createGroup, registerUser, type Created, type TestUser } from '../../fixtures';

interface MessageBody {
  id: string;
  threadId: string;
  authorId: string;
  content: string;
  parentId?: string;
}

interface MessageNode extends MessageBody {
  replies: MessageNode[];
}

describe('DSC-02: Messages and Replies', () => {
  let owner: TestUser;
  let groupId: string;

  async function openThread(title: string): Promise<string> {
    const thread = await httpClient.postJson<Created>(
      '/api/discussions',
      { title, context: 'group', groupId },
      owner.auth
    );
    expect(thread.status).toBe(201);
    return thread.data.id;
  }

  async function post(threadId: string, content: string, parentId?: string): Promise<MessageBody> {
    const response = await httpClient.postJson<MessageBody>(
      `/api/discussions/${threadId}/messages`,
      { content, parentId },
      owner.auth
    );
    expect(response.status).toBe(201);
    return response.data;
  }

  beforeEach(async () => {
    owner = await registerUser('Owner');
    groupId = (await createGroup(owner)).id;
  });

  it('should post a message', async () => {
    const threadId = await openThread('General');

    const message = await post(threadId, '  Hello there  ');

    expect(message).toMatchObject({ threadId, authorId: owner.id, content: 'Hello there' });
    expect(message.parentId).toBeUndefined();
  });

  it('should reject a reply to a message of another thread', async () => {
    const first = await openThread('First');
    const second = await openThread('Second');
    const foreign = await post(first, 'In the first thread');

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/discussions/${second}/messages`,
      { content: 'Reply', parentId: foreign.id },
      owner.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([
      { field: 'parentId', message: 'Parent message does not belong to this thread' },
    ]);
  });

  it('should nest replies in the tree view', async () => {
    const threadId = await openThread('Plans');
    const root = await post(threadId, 'Where do we meet?');
    const reply = await post(threadId, 'At the station', root.id);
    const nested = await post(threadId, 'Which exit?', reply.id);

    const tree = await httpClient.get<MessageNode[]>(`/api/discussions/${threadId}/messages?view=tree`, owner.auth);

    expect(tree.status).toBe(200);
    expect(tree.data).toHaveLength(1);
    expect(tree.data[0].id).toBe(root.id);
    expect(tree.data[0].replies.map((r) => r.id)).toEqual([reply.id]);
    expect(tree.data[0].replies[0].replies.map((r) => r.id)).toEqual([nested.id]);
    expect(tree.data[0].replies[0].replies[0].replies).toEqual([]);
  });

  it('should list every message in the flat view and the thread detail', async () => {
    const threadId = await openThread('Plans');
    const root = await post(threadId, 'Root');
    const reply = await post(threadId, 'Reply', root.id);

    const flat = await httpClient.get<MessageBody[]>(`/api/discussions/${threadId}/messages`, owner.auth);
    const detail = await httpClient.get<{ messages: MessageBody[] }>(`/api/discussions/${threadId}`, owner.auth);

    expect(flat.data.map((m) => m.id).sort()).toEqual([root.id, reply.id].sort());
    expect(flat.data.find((m) => m.id === reply.id)?.parentId).toBe(root.id);
    expect(detail.data.messages).toHaveLength(2);
  });

  it('should reject an unknown view', async () => {
    const threadId = await openThread('Plans');

    const response = await httpClient.get<ErrorResponse>(`/api/discussions/${threadId}/messages?view=graph`, owner.auth);

    expect(response.status).toBe(422);
    expect(response.data.errors?.map((e) => e.field)).toEqual(['view']);
  });
});
