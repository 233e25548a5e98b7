import { InMemorySessionStore } from '../collaborators';
import { ToolRegistry } from '../tool-registry';

describe('ToolRegistry', () => {
  it('should run a registered tool with its arguments', async () => {
    const registry = new ToolRegistry().register('echo', 'Echo back', (args) => args.text);

    const result = await registry.execute({ id: 'c1', name: 'echo', arguments: { text: 'ping' } });

    expect(result).toMatchObject({ call_id: 'c1', name: 'echo', success: true, output: 'ping' });
    expect(registry.list()).toEqual([{ name: 'echo', description: 'Echo back' }]);
  });

  it('should report a throwing tool as a failed result', async () => {
    const registry = new ToolRegistry().register('boom', 'Fails', () => {
      throw new Error('exploded');
    });

    const result = await registry.execute({ id: 'c2', name: 'boom', arguments: {} });

    expect(result).toMatchObject({ success: false, error: 'exploded' });
  });

  it('should report an unregistered tool without throwing', async () => {
    const result = await new ToolRegistry().execute({ id: 'c3', name: 'ghost', arguments: {} });

    expect(result).toEqual({
      call_id: 'c3',
      name: 'ghost',
      success: false,
      error: "Tool 'ghost' is not registered",
      duration_ms: 0,
    });
  });

  it('should refuse duplicate names', () => {
    const registry = new ToolRegistry().register('echo', 'Echo', () => null);

    expect(() => registry.register('echo', 'Echo again', () => null)).toThrow("Tool 'echo' is already registered");
  });
});

describe('InMemorySessionStore', () => {
  it('should keep only the most recent messages', async () => {
    const store = new InMemorySessionStore(2);
    await store.save('s-1', [
      { role: 'user', content: 'a' },
      { role: 'assistant', content: 'b' },
      { role: 'user', content: 'c' },
    ]);

    expect(await store.load('s-1')).toEqual([
      { role: 'assistant', content: 'b' },
      { role: 'user', content: 'c' },
    ]);
    expect(await store.load('s-2')).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it('should hand out copies', async () => {
    const store = new InMemorySessionStore();
    await store.save('s-1', [{ role: 'user', content: 'a' }]);

    const loaded = await store.load('s-1');
    loaded?.push({ role: 'user', content: 'b' });

    expect(await store.load('s-1')).toHaveLength(1);
  });
});
