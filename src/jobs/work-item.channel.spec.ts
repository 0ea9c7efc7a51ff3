import { OperationAbortedError } from '../common/abort';
import { WorkItemChannel } from './work-item.channel';

describe('WorkItemChannel', () => {
  it('delivers buffered items in write order', async () => {
    const channel = new WorkItemChannel<string>();
    channel.write('a');
    channel.write('b');

    expect(channel.size).toBe(2);
    expect(await channel.read()).toBe('a');
    expect(await channel.read()).toBe('b');
    expect(channel.size).toBe(0);
  });

  it('wakes waiting readers oldest first', async () => {
    const channel = new WorkItemChannel<number>();
    const first = channel.read();
    const second = channel.read();

    channel.write(1);
    channel.write(2);

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
  });

  it('rejects a waiting read when its signal aborts and keeps later items', async () => {
    const channel = new WorkItemChannel<number>();
    const controller = new AbortController();
    const read = channel.read(controller.signal);

    controller.abort();
    await expect(read).rejects.toBeInstanceOf(OperationAbortedError);

    channel.write(7);
    expect(channel.size).toBe(1);
    expect(await channel.read()).toBe(7);
  });

  it('rejects immediately with an aborted signal', async () => {
    const channel = new WorkItemChannel<number>();
    channel.write(1);

    await expect(channel.read(AbortSignal.abort())).rejects.toBeInstanceOf(
      OperationAbortedError,
    );
    expect(channel.size).toBe(1);
  });
});
