import { describe, expect, it } from 'vitest';

import { RunAggregator } from './aggregator.mts';
import { OUTCOME } from './util.ts';

describe('RunAggregator', () => {
  it('starts empty', () => {
    const aggregator = new RunAggregator();

    expect(aggregator.summary()).toEqual({
      changed: 0,
      unchanged: 0,
      offline: 0,
      error: 0,
    });
    expect(aggregator.lists()).toEqual({
      Changed: [],
      Unchanged: [],
      Offline: [],
      Error: [],
    });
  });

  it('lists each host once, under its last decision', () => {
    const aggregator = new RunAggregator();

    const outcome = aggregator.record({
      hostId: 'host-e',
      decisions: [
        { interfaceName: 'ether1', outcome: OUTCOME.ERROR, note: 'code 70' },
        { interfaceName: 'ether2', outcome: OUTCOME.CHANGED },
      ],
    });

    expect(outcome).toBe(OUTCOME.CHANGED);
    expect(aggregator.lists()).toEqual({
      Changed: ['host-e'],
      Unchanged: [],
      Offline: [],
      Error: [],
    });
  });

  it('counts every interface decision', () => {
    const aggregator = new RunAggregator();

    aggregator.record({
      hostId: 'host-e',
      decisions: [
        { interfaceName: 'ether1', outcome: OUTCOME.ERROR },
        { interfaceName: 'ether2', outcome: OUTCOME.CHANGED },
        { interfaceName: 'ether3', outcome: OUTCOME.CHANGED },
      ],
    });
    aggregator.record({
      hostId: 'host-c',
      decisions: [{ outcome: OUTCOME.OFFLINE }],
    });

    expect(aggregator.summary()).toEqual({
      changed: 2,
      unchanged: 0,
      offline: 1,
      error: 1,
    });
  });

  it('keeps hosts in the order they were recorded', () => {
    const aggregator = new RunAggregator();

    for (const hostId of ['c', 'a', 'b']) {
      aggregator.record({ hostId, decisions: [{ outcome: OUTCOME.OFFLINE }] });
    }

    expect(aggregator.lists().Offline).toEqual(['c', 'a', 'b']);
  });

  it('rejects a host reported twice', () => {
    const aggregator = new RunAggregator();
    aggregator.record({
      hostId: 'a',
      decisions: [{ outcome: OUTCOME.OFFLINE }],
    });

    expect(() =>
      aggregator.record({
        hostId: 'a',
        decisions: [{ outcome: OUTCOME.ERROR }],
      }),
    ).toThrow('Host a was reported twice');
  });

  it('rejects a report without decisions', () => {
    const aggregator = new RunAggregator();

    expect(() => aggregator.record({ hostId: 'a', decisions: [] })).toThrow(
      'Host a was reported without a decision',
    );
  });

  it('hands out copies of its lists', () => {
    const aggregator = new RunAggregator();
    aggregator.record({
      hostId: 'a',
      decisions: [{ outcome: OUTCOME.OFFLINE }],
    });

    aggregator.lists().Offline.push('b');

    expect(aggregator.lists().Offline).toEqual(['a']);
  });
});
