import { ReporterRegistry } from '../core/registry';
import { Reporter, ReportSection } from '../core/types';
import { fakeContext } from './helpers/fakes';

function reporter(name: string, order: number, rows: string[] = []): Reporter {
  return {
    name,
    order,
    run: async () => ({ title: `${name}:`, rows })
  };
}

describe('ReporterRegistry', () => {
  it('lists reporters by order, not registration', () => {
    const registry = new ReporterRegistry();
    registry.register(reporter('late', 30));
    registry.register(reporter('early', 10));
    registry.register(reporter('middle', 20));

    expect(registry.list().map(r => r.name)).toEqual(['early', 'middle', 'late']);
  });

  it('replaces a reporter registered twice under one name', () => {
    const registry = new ReporterRegistry();
    registry.register(reporter('dup', 10, ['first']));
    registry.register(reporter('dup', 10, ['second']));

    expect(registry.list()).toHaveLength(1);
  });

  it('hands each section to the sink in order', async () => {
    const registry = new ReporterRegistry();
    registry.register(reporter('b', 2, ['row b']));
    registry.register(reporter('a', 1, ['row a']));

    const seen: ReportSection[] = [];
    await registry.runAll(fakeContext(), section => seen.push(section));
    expect(seen).toEqual([
      { title: 'a:', rows: ['row a'] },
      { title: 'b:', rows: ['row b'] }
    ]);
  });

  it('stops at the first failing reporter after emitting earlier sections', async () => {
    const registry = new ReporterRegistry();
    const never = jest.fn(async () => ({ title: 'never:', rows: [] }));
    registry.register(reporter('ok', 1));
    registry.register({ name: 'broken', order: 2, run: async () => { throw new Error('no display'); } });
    registry.register({ name: 'after', order: 3, run: never });

    const titles: string[] = [];
    await expect(registry.runAll(fakeContext(), section => titles.push(section.title))).rejects.toThrow('no display');
    expect(titles).toEqual(['ok:']);
    expect(never).not.toHaveBeenCalled();
  });

  it('is a singleton through getInstance', () => {
    expect(ReporterRegistry.getInstance()).toBe(ReporterRegistry.getInstance());
  });
});
