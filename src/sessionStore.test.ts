import { describe, expect, it } from 'vitest';
import { DataProcessor } from './dataProcessor';
import { NotFoundError } from './errors';
import { SessionStore } from './sessionStore';

const load = (text: string) => DataProcessor.processCsvBuffer(Buffer.from(text), 'data.csv');

describe('SessionStore', () => {
  it('creates a session per loaded dataset', () => {
    const store = new SessionStore({ ttlMs: 1000 });
    const first = store.saveDataset(load('a\n1\n'));
    const second = store.saveDataset(load('b\n2\n'));

    expect(first.id).not.toBe(second.id);
    expect(store.get(first.id).dataset.headers).toEqual(['a']);
    expect(store.size).toBe(2);
  });

  it('replaces the dataset of an existing session and keeps its results', () => {
    const store = new SessionStore({ ttlMs: 1000 });
    const session = store.saveDataset(load('a\n1\n'));
    store.addResult(session.id, { question: 'q', answer: 'a', timestamp: '2024-01-01T00:00:00.000Z' });

    const replaced = store.saveDataset(load('b\n2\n'), session.id);

    expect(replaced.id).toBe(session.id);
    expect(store.get(session.id).dataset.headers).toEqual(['b']);
    expect(store.get(session.id).results).toHaveLength(1);
  });

  it('expires sessions idle for longer than the TTL', () => {
    let clock = 0;
    const store = new SessionStore({ ttlMs: 1000, now: () => clock });
    const session = store.saveDataset(load('a\n1\n'));

    clock = 500;
    expect(store.get(session.id).id).toBe(session.id);
    clock = 1400;
    expect(store.get(session.id).id).toBe(session.id);
    clock = 2400;
    expect(() => store.get(session.id)).toThrow(NotFoundError);
    expect(store.size).toBe(0);
  });

  it('starts a new session when the given id is unknown', () => {
    const store = new SessionStore({ ttlMs: 1000 });
    const session = store.saveDataset(load('a\n1\n'), 'missing');

    expect(session.id).not.toBe('missing');
    expect(store.get(session.id).dataset.headers).toEqual(['a']);
    expect(store.size).toBe(1);
  });

  it('starts a new session when the given one has expired', () => {
    let clock = 0;
    const store = new SessionStore({ ttlMs: 1000, now: () => clock });
    const expired = store.saveDataset(load('a\n1\n'));
    store.addResult(expired.id, { question: 'q', answer: 'a', timestamp: '2024-01-01T00:00:00.000Z' });

    clock = 5000;
    const fresh = store.saveDataset(load('b\n2\n'), expired.id);

    expect(fresh.id).not.toBe(expired.id);
    expect(fresh.results).toEqual([]);
    expect(() => store.get(expired.id)).toThrow(NotFoundError);
  });
});
