import { describe, it, expect, beforeEach } from 'vitest';
import { DashboardService, paginate } from '@/services/dashboardService';
import { CacheService, fingerprint } from '@/services/cacheService';
import { NoDatasetError, UnsupportedFileTypeError } from '@/utils/errors';

const SALES_CSV = [
  'Transaction Date,Transaction Time,Store Location,Product Category,Total Bill',
  '01/01/2024,08:15,Downtown,Coffee,360',
  '01/01/2024,09:00,Uptown,Tea,15',
  '02/01/2024,08:30,Downtown,Coffee,20',
  ''
].join('\n');

describe('DashboardService', () => {
  let service: DashboardService;

  beforeEach(() => {
    service = new DashboardService();
  });

  it('refuses queries before anything is uploaded', () => {
    expect(service.hasDataset()).toBe(false);
    expect(() => service.getSummary()).toThrow(NoDatasetError);
  });

  it('prepares an upload and reports the detected columns', async () => {
    const result = await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    expect(result.cached).toBe(false);
    expect(result.shape).toEqual({ rows: 3, columns: 5 });
    expect(result.detection.roles).toEqual({
      date: 'Transaction Date',
      time: 'Transaction Time',
      location: 'Store Location',
      category: 'Product Category',
      amount: 'Total Bill'
    });
    expect(result.detection.fallbacks).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('aggregates the uploaded data for the selected filters', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    const { filters, views } = service.getViews({ hour: 8 });

    expect(filters).toEqual({ location: 'All Locations', category: 'All Categories', hour: 8 });
    expect(views.daily).toEqual([
      { label: '2024-01-01', value: 36 },
      { label: '2024-01-02', value: 20 }
    ]);
    expect(views.byLocation).toEqual([
      { label: 'Downtown', value: 56 },
      { label: 'Uptown', value: 15 }
    ]);
  });

  it('summarises the whole dataset', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    expect(service.getSummary()).toEqual({
      totalRevenue: 71,
      transactionCount: 3,
      averageTransaction: 71 / 3,
      dateRange: { start: '2024-01-01', end: '2024-01-02' }
    });
  });

  it('reuses the prepared data for an identical upload', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));
    const again = await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    expect(again.cached).toBe(true);
  });

  it('replaces the dataset when a different file is uploaded', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));
    await service.ingest('other.csv', Buffer.from('date,store,total\n2024-05-01,Harbor,9\n'));

    expect(service.getFilterOptions().locations).toEqual(['All Locations', 'Harbor']);
    expect(service.getDataset().fileName).toBe('other.csv');
  });

  it('clears the dashboard when an upload fails', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    await expect(service.ingest('coffee.json', Buffer.from('{}'))).rejects.toBeInstanceOf(UnsupportedFileTypeError);
    expect(service.hasDataset()).toBe(false);
  });

  it('pages through the enriched table with derived columns', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    const page = service.getTable(2, 2);

    expect(page.columns).toEqual([
      'Transaction Date',
      'Transaction Time',
      'Store Location',
      'Product Category',
      'Total Bill',
      'parsed_date',
      'weekday_name',
      'day_name',
      'month_name',
      'hour'
    ]);
    expect(page.data).toEqual([
      {
        'Transaction Date': '02/01/2024',
        'Transaction Time': '08:30',
        'Store Location': 'Downtown',
        'Product Category': 'Coffee',
        'Total Bill': 20,
        parsed_date: '2024-01-02',
        weekday_name: 'Tuesday',
        day_name: 'Tuesday',
        month_name: 'January',
        hour: 8
      }
    ]);
    expect(page.pagination).toEqual({
      total: 3,
      limit: 2,
      offset: 2,
      hasMore: false,
      totalPages: 2,
      currentPage: 2
    });
  });

  it('returns the raw preview rows', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    const preview = service.getPreview(1);

    expect(preview.rows).toEqual([
      {
        'Transaction Date': '01/01/2024',
        'Transaction Time': '08:15',
        'Store Location': 'Downtown',
        'Product Category': 'Coffee',
        'Total Bill': 360
      }
    ]);
  });

  it('builds chart descriptors for the effective filters', async () => {
    await service.ingest('coffee.csv', Buffer.from(SALES_CSV));

    const { filters, charts } = service.getCharts({ location: 'Uptown' });

    expect(filters.hour).toBe(9);
    expect(charts[0].title).toBe('Daily Revenue Trend (Hour: 9)');
    expect(charts[0].points).toEqual([{ label: '2024-01-01', value: 15 }]);
  });
});

describe('paginate', () => {
  it('slices by row offset', () => {
    expect(paginate([1, 2, 3, 4, 5], 2, 0)).toEqual({
      data: [1, 2],
      pagination: { total: 5, limit: 2, offset: 0, hasMore: true, totalPages: 3, currentPage: 1 }
    });
  });
});

describe('CacheService', () => {
  it('keeps a single entry and replaces it on a new key', () => {
    const cache = new CacheService<string>();
    cache.set('a', 'first');
    cache.set('b', 'second');

    expect(cache.get('a')).toBeNull();
    expect(cache.get('b')).toBe('second');
    expect(cache.getStats().keys).toBe(1);

    cache.clear();
    expect(cache.current()).toBeNull();
  });

  it('fingerprints uploads by name and content', () => {
    const content = Buffer.from('a,b\n1,2\n');

    expect(fingerprint('x.csv', content)).toBe(fingerprint('x.csv', Buffer.from('a,b\n1,2\n')));
    expect(fingerprint('x.csv', content)).not.toBe(fingerprint('y.csv', content));
    expect(fingerprint('x.csv', content)).not.toBe(fingerprint('x.csv', Buffer.from('a,b\n1,3\n')));
  });
});
