import { describe, it, expect, vi } from 'vitest';
import { PayloadShapeError } from '../../../common/errors.js';
import { blsAdapter, fredAdapter, metalsAdapter, type DroppedEntry } from '../adapters/index.js';

function blsPayload(data: unknown[]) {
  return {
    status: 'REQUEST_SUCCEEDED',
    responseTime: 40,
    message: [],
    Results: { series: [{ seriesID: 'CUUR0000SA0', data }] },
  };
}

describe('BLS adapter', () => {

  it('normalizes M05 to the first day of May', () => {
    const out = blsAdapter.produce(
      blsPayload([{ year: '2024', period: 'M05', periodName: 'May', value: '310.1', footnotes: [{}] }]),
      'cpi'
    );

    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ seriesType: 'cpi', date: '2024-05-01', value: 310.1, high: 310.1, low: 310.1 });
    expect(out[0].rawPayload).toEqual({ year: '2024', period: 'M05', periodName: 'May', value: '310.1', footnotes: [{}] });
  });

  it('drops blank values as unpublished periods', () => {
    const drops: DroppedEntry[] = [];
    const out = blsAdapter.produce(
      blsPayload([
        { year: '2024', period: 'M06', value: '' },
        { year: '2024', period: 'M07', value: '   ' },
        { year: '2024', period: 'M04', value: '309.7' },
      ]),
      'cpi',
      { onDrop: d => drops.push(d) }
    );

    expect(out.map(o => o.date)).toEqual(['2024-04-01']);
    expect(drops.map(d => d.index)).toEqual([0, 1]);
    expect(drops[0].reason).toBe('no value published for 2024 M06');
  });

  it('maps unrecognized period codes to January', () => {
    const out = blsAdapter.produce(blsPayload([{ year: '2023', period: 'S01', value: '300.0' }]), 'cpi');
    expect(out[0].date).toBe('2023-01-01');
    expect(out[0].value).toBe(300);
  });

  it('keeps the explicit January entry over an annual average on the same date', () => {
    const onDrop = vi.fn();
    const out = blsAdapter.produce(
      blsPayload([
        { year: '2023', period: 'M13', value: '304.7' },
        { year: '2023', period: 'M01', value: '299.2' },
      ]),
      'cpi',
      { onDrop }
    );

    expect(out).toHaveLength(1);
    expect(out[0].value).toBe(299.2);
    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop.mock.calls[0][0].index).toBe(0);
  });

  it('keeps the first of two entries for the same month', () => {
    const out = blsAdapter.produce(
      blsPayload([
        { year: '2024', period: 'M03', value: '312.2' },
        { year: '2024', period: 'M03', value: '311.0' },
      ]),
      'cpi'
    );
    expect(out).toHaveLength(1);
    expect(out[0].value).toBe(312.2);
  });

  it('isolates an unparsable value and keeps the rest', () => {
    const onDrop = vi.fn();
    const out = blsAdapter.produce(
      blsPayload([
        { year: '2024', period: 'M02', value: 'n/a' },
        { year: '2024', period: 'M01', value: '308.4' },
        { period: 'M01', value: '1.0' },
      ]),
      'cpi',
      { onDrop }
    );
    expect(out.map(o => o.date)).toEqual(['2024-01-01']);
    expect(onDrop).toHaveBeenCalledTimes(2);
  });

  it('fails the whole call when there are no series entries', () => {
    expect(() => blsAdapter.produce({ status: 'REQUEST_SUCCEEDED', Results: { series: [] } }, 'cpi')).toThrow(
      PayloadShapeError
    );
    expect(() => blsAdapter.produce({ status: 'REQUEST_SUCCEEDED' }, 'cpi')).toThrow(PayloadShapeError);
  });
});

describe('Metals adapter', () => {
  const spot = {
    status: 'success',
    currency: 'USD',
    unit: 'toz',
    metal: 'gold',
    rate: { price: 2345.5, ask: 2346.1, bid: 2344.9, high: 2361.25, low: 2330.75, change: 4.2, change_percent: 0.18 },
    timestamp: '2024-06-01T14:22:09.512Z',
  };

  it('emits exactly one observation with the source range', () => {
    const out = metalsAdapter.produce(spot, 'gold');
    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ seriesType: 'gold', date: '2024-06-01', value: 2345.5, high: 2361.25, low: 2330.75 });
    expect(out[0].rawPayload).toEqual(spot);
  });

  it('uses the price as range when high and low are missing', () => {
    const out = metalsAdapter.produce({ timestamp: '2024-06-02T00:00:01Z', rate: { price: '28.41' } }, 'silver');
    expect(out[0]).toMatchObject({ date: '2024-06-02', value: 28.41, high: 28.41, low: 28.41 });
  });

  it('rejects a payload without a rate object', () => {
    expect(() => metalsAdapter.produce({ timestamp: '2024-06-01T10:00:00Z' }, 'gold')).toThrow(PayloadShapeError);
  });

  it('rejects an unreadable timestamp or price', () => {
    expect(() => metalsAdapter.produce({ ...spot, timestamp: 'now' }, 'gold')).toThrow(
      '[metals] invalid payload: timestamp: not an ISO-8601 date "now"'
    );
    expect(() => metalsAdapter.produce({ ...spot, rate: { price: 'n/a' } }, 'gold')).toThrow(PayloadShapeError);
  });
});

describe('FRED adapter', () => {

  it('drops the dot sentinel and keeps the numeric observation', () => {
    const onDrop = vi.fn();
    const out = fredAdapter.produce(
      {
        observations: [
          { date: '2024-01-01', value: '.' },
          { date: '2024-02-01', value: '3.2' },
        ],
      },
      'fed_funds',
      { onDrop }
    );

    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ seriesType: 'fed_funds', date: '2024-02-01', value: 3.2, high: 3.2, low: 3.2 });
    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop.mock.calls[0][0]).toMatchObject({ index: 0, reason: 'no value published: "."' });
  });

  it('does not let one bad observation abort the batch', () => {
    const out = fredAdapter.produce(
      {
        observations: [
          { date: '2024-03-01', value: 'abc' },
          { date: 'March 2024', value: '5.33' },
          { date: '2024-04-01', value: '5.33' },
          { date: '2024-04-01', value: '5.40' },
          { date: '2024-05-01' },
        ],
      },
      'fed_funds'
    );
    expect(out.map(o => [o.date, o.value])).toEqual([['2024-04-01', 5.33]]);
  });

  it('fails the whole call when observations are missing', () => {
    expect(() => fredAdapter.produce({ count: 0 }, 'fed_funds')).toThrow(PayloadShapeError);
    expect(() => fredAdapter.produce(null, 'fed_funds')).toThrow(PayloadShapeError);
  });
});
