import { RtmsAdapter, failureOutcome } from '../src/adapters/rtms.adapter';
import { ResultCache } from '../src/lib/cache';
import { createHttpClient } from '../src/lib/http';
import { TransactionService } from '../src/services/transaction.service';
import type { FetchOutcome, ProductType, TransactionRecord } from '../src/types';
import { createStubTransport, ok } from './helpers/transport';

function record(product: ProductType, ym: string, day: number): TransactionRecord {
  const year = Number(ym.slice(0, 4));
  const month = Number(ym.slice(4));
  return {
    product,
    lawdCd: '11140',
    dealYm: ym,
    dealDate: `${ym.slice(0, 4)}-${ym.slice(4)}-${String(day).padStart(2, '0')}`,
    name: `${product}-${ym}-${day}`,
    areaM2: 59.9,
    amountManwon: 50000,
    dealYear: year,
    dealMonth: month,
    dealDay: day,
    floor: 3,
    legalDong: '태평로1가',
    jibun: null,
    roadName: null,
    buildYear: null,
  };
}

function success(records: TransactionRecord[]): FetchOutcome {
  return { ok: true, records, resultCode: '000', resultMessage: 'OK', totalCount: records.length, keyVariant: 0, pages: 1 };
}

function fakeFetcher(respond: (product: ProductType, ym: string) => FetchOutcome, hasKey = true) {
  return {
    hasServiceKey: jest.fn(() => hasKey),
    fetchProductMonth: jest.fn(async (product: ProductType, _lawdCd: string, ym: string) => respond(product, ym)),
  };
}

function monthXml(ym: string): string {
  return [
    '<response><header><resultCode>000</resultCode><resultMsg>OK</resultMsg></header><body><items><item>',
    `<aptNm>단지${ym}</aptNm><dealAmount>70,000</dealAmount>`,
    `<dealYear>${ym.slice(0, 4)}</dealYear><dealMonth>${Number(ym.slice(4))}</dealMonth><dealDay>15</dealDay>`,
    '</item></items><totalCount>1</totalCount></body></response>',
  ].join('');
}

describe('TransactionService.fetchRange', () => {
  it('returns the records of 3 months when 2 of 5 time out', async () => {
    const failing = new Set(['202501', '202411']);
    const stub = createStubTransport((call) => {
      const ym = String(call.params['DEAL_YMD']);
      return failing.has(ym) ? { timeout: true } : ok(monthXml(ym));
    });
    const adapter = new RtmsAdapter({
      serviceKey: 'test-service-key',
      endpoints: { apt: 'https://rtms.test/apt', offi: 'https://rtms.test/offi' },
      http: createHttpClient({ adapter: stub.adapter, retry: { maxAttempts: 1 } }),
      cache: new ResultCache<FetchOutcome>(600),
    });
    const service = new TransactionService({ fetcher: adapter, concurrency: 4 });

    const result = await service.fetchRange({ lawdCd: '1114010100', endYm: '202502', monthsBack: 5, products: ['apt'] });

    expect(result.months).toEqual(['202502', '202501', '202412', '202411', '202410']);
    expect(result.attempted).toBe(5);
    expect(result.succeeded).toBe(3);
    expect(result.withData).toBe(3);
    expect(result.source_status).toBe('degraded');
    expect(result.records.map((r) => r.dealDate)).toEqual(['2025-02-15', '2024-12-15', '2024-10-15']);
    expect(result.outcomes.map((o) => [o.ym, o.ok])).toEqual([
      ['202502', true],
      ['202501', false],
      ['202412', true],
      ['202411', false],
      ['202410', true],
    ]);
    expect(result.lastFailure?.kind).toBe('network_error');
    expect(result.summary).toBe(
      '3/5 calls succeeded (last failure: network_error code ECONNABORTED: timeout (timeout of 20000ms exceeded))'
    );
  });

  it('concatenates product sub-ranges and sorts by deal date', async () => {
    const fetcher = fakeFetcher((product, ym) =>
      success(product === 'apt' ? [record('apt', ym, 3)] : [record('offi', ym, 20), record('offi', ym, 1)])
    );
    const service = new TransactionService({ fetcher, concurrency: 2 });

    const result = await service.fetchRange({ lawdCd: '11140', endYm: '202501', monthsBack: 2, products: ['apt', 'offi'] });

    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(4);
    expect(result.source_status).toBe('ok');
    expect(result.summary).toBe('4/4 calls succeeded');
    expect(result.records.map((r) => r.name)).toEqual([
      'offi-202501-20',
      'apt-202501-3',
      'offi-202501-1',
      'offi-202412-20',
      'apt-202412-3',
      'offi-202412-1',
    ]);
  });

  it('counts empty successful months separately from months with data', async () => {
    const fetcher = fakeFetcher((_product, ym) => success(ym === '202501' ? [record('apt', ym, 9)] : []));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRange({ lawdCd: '11140', endYm: '202501', monthsBack: 3, products: ['apt'] });

    expect(result.succeeded).toBe(3);
    expect(result.withData).toBe(1);
    expect(result.lastFailure).toBeUndefined();
  });

  it('maps a total failure to the last failure status', async () => {
    const fetcher = fakeFetcher(() => failureOutcome({ kind: 'upstream_error', code: '22', message: 'LIMITED' }));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRange({ lawdCd: '11140', endYm: '202501', monthsBack: 2, products: ['apt'] });

    expect(result.records).toEqual([]);
    expect(result.succeeded).toBe(0);
    expect(result.source_status).toBe('upstream_error');
    expect(result.summary).toBe('0/2 calls succeeded (last failure: upstream_error code 22: LIMITED)');
  });

  it('short-circuits once when the service key is missing', async () => {
    const fetcher = fakeFetcher(() => success([]), false);
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRange({ lawdCd: '11140', endYm: '202501', monthsBack: 12, products: ['apt', 'offi'] });

    expect(fetcher.fetchProductMonth).not.toHaveBeenCalled();
    expect(result.source_status).toBe('missing_api_key');
    expect(result.lastFailure).toEqual({ kind: 'config_error', message: 'SERVICE_KEY is not configured' });
    expect(result.attempted).toBe(0);
  });

  it('never asks for more than 60 months', async () => {
    const fetcher = fakeFetcher(() => success([]));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRange({ lawdCd: '11140', endYm: '202501', monthsBack: 100, products: ['apt'] });

    expect(result.monthsBack).toBe(60);
    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(60);
  });
});

describe('TransactionService.fetchRangeWithExpansion', () => {
  it('widens an empty window along the ladder and stops at the first hit', async () => {
    const fetcher = fakeFetcher((_product, ym) => success(ym === '202303' ? [record('apt', ym, 2)] : []));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 6,
      products: ['apt'],
    });

    expect(result.monthsBack).toBe(24);
    expect(result.expandedFrom).toBe(6);
    expect(result.records.map((r) => r.dealDate)).toEqual(['2023-03-02']);
    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(6 + 24);
  });

  it('runs each ladder step once when nothing is found', async () => {
    const fetcher = fakeFetcher(() => success([]));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 30,
      products: ['apt'],
    });

    expect(result.monthsBack).toBe(60);
    expect(result.expandedFrom).toBe(30);
    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(30 + 36 + 48 + 60);
  });

  it('returns the first result when it already has records', async () => {
    const fetcher = fakeFetcher((_product, ym) => success([record('apt', ym, 1)]));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 2,
      products: ['apt'],
    });

    expect(result.expandedFrom).toBeUndefined();
    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(2);
  });

  it('does not expand when every call of the window failed', async () => {
    const fetcher = fakeFetcher(() => failureOutcome({ kind: 'upstream_error', code: '22', message: 'LIMITED' }));
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 6,
      products: ['apt', 'offi'],
    });

    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(12);
    expect(result.monthsBack).toBe(6);
    expect(result.expandedFrom).toBeUndefined();
    expect(result.summary).toBe('0/12 calls succeeded (last failure: upstream_error code 22: LIMITED)');
  });

  it('stops widening once a whole step fails', async () => {
    let calls = 0;
    const fetcher = fakeFetcher(() => {
      calls += 1;
      return calls <= 6 ? success([]) : failureOutcome({ kind: 'upstream_error', code: '22', message: 'LIMITED' });
    });
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 6,
      products: ['apt'],
    });

    expect(fetcher.fetchProductMonth).toHaveBeenCalledTimes(6 + 24);
    expect(result.monthsBack).toBe(24);
    expect(result.expandedFrom).toBe(6);
    expect(result.succeeded).toBe(0);
  });

  it('does not expand when the key is missing', async () => {
    const fetcher = fakeFetcher(() => success([]), false);
    const service = new TransactionService({ fetcher });

    const result = await service.fetchRangeWithExpansion({
      lawdCd: '11140',
      endYm: '202501',
      monthsBack: 6,
      products: ['apt'],
    });

    expect(result.source_status).toBe('missing_api_key');
    expect(result.expandedFrom).toBeUndefined();
  });
});
