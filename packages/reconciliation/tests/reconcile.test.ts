import { describe, expect, it } from 'vitest';
import { changedFields, reconcile } from '../src/index.js';
import { registryOf, scraped, stored, t0, t1, t2 } from './factories.js';

const A = 'greenhouse:acme:A';
const B = 'greenhouse:acme:B';

describe('reconcile', () => {
  it('marks everything new on a fresh run', () => {
    const result = reconcile(new Map(), [scraped('A')], t0);

    expect(result.events).toHaveLength(1);
    expect(result.events[0]).toMatchObject({ eventType: 'appeared', jobId: A, timestamp: t0 });
    expect(result.events[0]!.previousData).toBeUndefined();
    expect(result.events[0]!.newData).toMatchObject({
      title: 'Engineer',
      status: 'new',
      firstSeen: '2024-05-01T06:00:00.000Z',
      lastSeen: '2024-05-01T06:00:00.000Z',
    });
    expect(result.registry.size).toBe(1);
    expect(result.registry.get(A)).toMatchObject({ status: 'new', firstSeen: t0, lastSeen: t0 });
    expect(result.summary).toEqual({ appeared: 1, updated: 0, closed: 0, active: 0, total: 1 });
  });

  it('keeps an unchanged posting active and advances lastSeen', () => {
    const result = reconcile(registryOf(stored('A')), [scraped('A')], t1);

    expect(result.events).toEqual([]);
    expect(result.registry.get(A)).toMatchObject({ status: 'active', firstSeen: t0, lastSeen: t1 });
    expect(result.registry.get(A)!.updatedAt).toBeUndefined();
  });

  it('emits updated with both snapshots when the title changes', () => {
    const result = reconcile(registryOf(stored('A')), [scraped('A', { title: 'Senior Engineer' })], t1);

    expect(result.events).toHaveLength(1);
    const [event] = result.events;
    expect(event!.eventType).toBe('updated');
    expect(event!.previousData?.title).toBe('Engineer');
    expect(event!.newData?.title).toBe('Senior Engineer');
    expect(result.registry.get(A)).toMatchObject({
      status: 'updated',
      firstSeen: t0,
      lastSeen: t1,
      updatedAt: t1,
    });
  });

  it('closes postings that disappeared and keeps their timestamps', () => {
    const result = reconcile(registryOf(stored('A'), stored('B')), [scraped('A')], t1);

    expect(result.events).toHaveLength(1);
    expect(result.events[0]).toMatchObject({ eventType: 'closed', jobId: B, timestamp: t1 });
    expect(result.events[0]!.previousData?.status).toBe('active');
    expect(result.events[0]!.newData).toBeUndefined();
    expect(result.registry.get(B)).toMatchObject({ status: 'closed', firstSeen: t0, lastSeen: t0, title: 'Engineer' });
    expect(result.summary).toEqual({ appeared: 0, updated: 0, closed: 1, active: 1, total: 2 });
  });

  it('evicts a closed posting on the next run without a second closed event', () => {
    const first = reconcile(registryOf(stored('A'), stored('B')), [scraped('A')], t1);
    const second = reconcile(first.registry, [scraped('A')], t2);

    expect(second.events).toEqual([]);
    expect(second.registry.has(B)).toBe(false);
    expect(second.evicted).toEqual([B]);
  });

  it('treats a closed posting that comes back as appeared', () => {
    const first = reconcile(registryOf(stored('A'), stored('B')), [scraped('A')], t1);
    const second = reconcile(first.registry, [scraped('A'), scraped('B')], t2);

    expect(second.events.map((event) => [event.eventType, event.jobId])).toEqual([['appeared', B]]);
    expect(second.registry.get(B)).toMatchObject({ status: 'new', firstSeen: t2, lastSeen: t2 });
  });

  it('lets the last duplicate win and reports it', () => {
    const result = reconcile(
      new Map(),
      [scraped('A', { title: 'First' }), scraped('B'), scraped('A', { title: 'Second' })],
      t0,
    );

    expect(result.registry.get(A)!.title).toBe('Second');
    expect(result.registry.size).toBe(2);
    expect(result.duplicates).toEqual([A]);
    expect(result.summary.appeared).toBe(2);
  });

  it('carries updatedAt forward while a posting stays unchanged', () => {
    const previous = registryOf(stored('A', { status: 'updated', lastSeen: t1, updatedAt: t1 }));

    const result = reconcile(previous, [scraped('A')], t2);

    expect(result.registry.get(A)).toMatchObject({ status: 'active', firstSeen: t0, lastSeen: t2, updatedAt: t1 });
  });

  it('orders events appeared, updated, closed', () => {
    const previous = registryOf(stored('A'), stored('B'));

    const result = reconcile(previous, [scraped('A', { title: 'Lead Engineer' }), scraped('C')], t1);

    expect(result.events.map((event) => event.eventType)).toEqual(['appeared', 'updated', 'closed']);
  });

  it('freezes event snapshots', () => {
    const result = reconcile(new Map(), [scraped('A')], t0);

    expect(Object.isFrozen(result.events[0]!.newData)).toBe(true);
  });

  it('never moves lastSeen before firstSeen', () => {
    const result = reconcile(registryOf(stored('A', { firstSeen: t2, lastSeen: t2 })), [scraped('A')], t1);

    expect(result.registry.get(A)).toMatchObject({ firstSeen: t2, lastSeen: t2 });
  });
});

describe('change detection', () => {
  it('ignores rawData, URLs, requirements, salary and remote metadata', () => {
    const previous = registryOf(
      stored('A', {
        rawData: { id: 1 },
        applyUrl: 'https://example.com/apply/1',
        requirements: ['Go'],
        salaryRange: '$100K',
        remotePolicy: 'Remote',
      }),
    );
    const aggregate = [
      scraped('A', {
        rawData: { id: 1, internal: 'changed' },
        jobUrl: 'https://boards.greenhouse.io/acme/jobs/A?gh_src=feed',
        applyUrl: 'https://example.com/apply/2',
        requirements: ['Go', 'Rust'],
        salaryRange: '$120K',
        remotePolicy: 'Hybrid',
      }),
    ];

    const result = reconcile(previous, aggregate, t1);

    expect(result.events).toEqual([]);
    expect(result.registry.get(A)!.status).toBe('active');
    expect(result.registry.get(A)!.requirements).toEqual(['Go', 'Rust']);
  });

  it('reports each compared field that differs', () => {
    expect(
      changedFields(
        { title: 'Engineer', team: 'Core', location: 'Remote', employmentType: undefined, description: 'a' },
        { title: 'Engineer', team: 'Platform', location: 'Remote', employmentType: 'Full-time', description: 'a' },
      ),
    ).toEqual(['team', 'employmentType']);
  });

  it('treats absent and empty values as equal', () => {
    expect(
      changedFields(
        { title: 'Engineer', team: undefined, location: undefined, employmentType: undefined, description: '' },
        { title: 'Engineer', team: '', location: undefined, employmentType: undefined, description: undefined },
      ),
    ).toEqual([]);
  });
});

describe('reconcile properties', () => {
  it('is idempotent when fed its own registry', () => {
    const aggregate = [scraped('A'), scraped('B'), scraped('C')];

    const first = reconcile(new Map(), aggregate, t0);
    const second = reconcile(first.registry, aggregate, t1);

    expect(second.events).toEqual([]);
    expect([...second.registry.values()].map((posting) => posting.status)).toEqual(['active', 'active', 'active']);
  });

  it('keeps firstSeen from the first appearance across updates', () => {
    const first = reconcile(new Map(), [scraped('A')], t0);
    const second = reconcile(first.registry, [scraped('A', { title: 'Staff Engineer' })], t1);
    const third = reconcile(second.registry, [scraped('A', { title: 'Staff Engineer' })], t2);

    expect([first, second, third].map((result) => result.registry.get(A)!.firstSeen)).toEqual([t0, t0, t0]);
    expect(third.registry.get(A)!.status).toBe('active');
  });

  it('partitions current and live previous keys without overlap', () => {
    const previous = registryOf(stored('A'), stored('B'), stored('C'), stored('D', { status: 'closed' }));
    const aggregate = [scraped('B'), scraped('C', { title: 'Manager' }), scraped('E')];

    const result = reconcile(previous, aggregate, t1);

    const byType = (type: string) =>
      result.events.filter((event) => event.eventType === type).map((event) => event.jobId);
    const appeared = byType('appeared');
    const updated = byType('updated');
    const closed = byType('closed');
    const unchanged = [...result.registry.values()]
      .filter((posting) => posting.status === 'active')
      .map((posting) => posting.jobId);

    const union = [...appeared, ...updated, ...closed, ...unchanged].sort();
    expect(union).toEqual([
      'greenhouse:acme:A',
      'greenhouse:acme:B',
      'greenhouse:acme:C',
      'greenhouse:acme:E',
    ]);
    expect(new Set(union).size).toBe(union.length);
    expect([...result.registry.keys()].sort()).toEqual(union);
    expect(result.evicted).toEqual(['greenhouse:acme:D']);
  });
});
