import { EventChannel } from '../../src/connection/event-channel';
import { ProgressEvent } from '../../src/connection/types';
import { transportError } from '../../src/domain/errors';

const running: ProgressEvent = { type: 'running', jobId: 'job-1' };
const succeeded: ProgressEvent = { type: 'succeeded', jobId: 'job-1' };

async function collect(channel: EventChannel): Promise<string[]> {
  const types: string[] = [];
  for await (const event of channel) types.push(event.type);
  return types;
}

describe('EventChannel', () => {
  it('delivers buffered events in order and then ends', async () => {
    const channel = new EventChannel();
    channel.push(running);
    channel.push(succeeded);
    channel.end();
    expect(await collect(channel)).toEqual(['running', 'succeeded']);
    expect(channel.closed).toBe(true);
  });

  it('resumes a waiting consumer on push', async () => {
    const channel = new EventChannel();
    const pending = channel.next();
    channel.push(running);
    await expect(pending).resolves.toEqual({ value: running, done: false });
  });

  it('ignores pushes after end', async () => {
    const channel = new EventChannel();
    channel.end();
    channel.push(running);
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('raises a failure after buffered events drain', async () => {
    const channel = new EventChannel();
    channel.push(running);
    channel.fail(transportError('socket closed', { code: 'TRANSPORT.DISCONNECTED' }));

    await expect(channel.next()).resolves.toEqual({ value: running, done: false });
    await expect(channel.next()).rejects.toMatchObject({ code: 'TRANSPORT.DISCONNECTED' });
  });

  it('rejects a waiting consumer on failure', async () => {
    const channel = new EventChannel();
    const pending = channel.next();
    channel.fail(transportError('socket closed'));
    await expect(pending).rejects.toThrow('socket closed');
  });

  it('close discards buffered events and notifies the owner once', async () => {
    const onClose = jest.fn();
    const channel = new EventChannel(onClose);
    channel.push(running);
    channel.close();
    channel.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('breaking out of for-await closes the channel', async () => {
    const onClose = jest.fn();
    const channel = new EventChannel(onClose);
    channel.push(running);
    channel.push(succeeded);
    for await (const event of channel) {
      if (event.type === 'running') break;
    }
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(channel.closed).toBe(true);
  });
});
