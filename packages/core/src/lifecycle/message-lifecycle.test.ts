import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSession } from '../session/types.js';
import { MessageLifecycleManager } from './message-lifecycle.js';
import { FakeTransport } from '../testing/fakes.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MessageLifecycleManager', () => {
  it('detaches the displayed artifact and the image behind it', () => {
    const lifecycle = new MessageLifecycleManager(new FakeTransport());
    const session = createSession('c1');
    session.displayedArtifact = { ref: '10', kind: 'image' };
    session.lastImage = { data: Buffer.from('png'), mimeType: 'image/png' };

    expect(lifecycle.detach(session)).toEqual({ ref: '10', kind: 'image' });
    expect(session.displayedArtifact).toBeUndefined();
    expect(session.lastImage).toBeUndefined();
    expect(lifecycle.detach(session)).toBeUndefined();
  });

  it('records the new artifact', () => {
    const lifecycle = new MessageLifecycleManager(new FakeTransport());
    const session = createSession('c1');
    lifecycle.record(session, { ref: '11', kind: 'error' });
    expect(session.displayedArtifact).toEqual({ ref: '11', kind: 'error' });
  });

  it('deletes the message through the transport', async () => {
    const transport = new FakeTransport();
    const lifecycle = new MessageLifecycleManager(transport);

    await expect(lifecycle.retract('c1', { ref: '10', kind: 'image' })).resolves.toBe(true);
    expect(transport.deleted).toEqual([{ conversationId: 'c1', ref: '10' }]);
  });

  it('swallows and logs a thrown delete failure', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transport = new FakeTransport();
    transport.deleteFailure = new Error('message to delete not found');
    const lifecycle = new MessageLifecycleManager(transport);

    await expect(lifecycle.retract('c1', { ref: '10', kind: 'error' })).resolves.toBe(false);
    expect(warn).toHaveBeenCalledWith(
      '[Lifecycle] Could not delete error message 10 in c1:',
      'message to delete not found',
    );
  });

  it('logs a delete the platform refused', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transport = new FakeTransport();
    transport.deleteResult = false;
    const lifecycle = new MessageLifecycleManager(transport);

    await expect(lifecycle.retract('c1', { ref: '10', kind: 'image' })).resolves.toBe(false);
    expect(warn).toHaveBeenCalledWith('[Lifecycle] Could not delete image message 10 in c1');
  });
});
