import { ChartDescriptor, DashboardViews, FilterState } from '@/types/data';

/**
 * Declarative chart configuration for the three dashboard charts. Drawing and
 * styling are left to the client.
 */
export function buildCharts(views: DashboardViews, filters: FilterState): ChartDescriptor[] {
  return [
    {
      id: 'daily-revenue',
      kind: 'line',
      title: `Daily Revenue Trend (Hour: ${filters.hour})`,
      xAxisTitle: 'Date',
      yAxisTitle: 'Total Revenue ($)',
      points: views.daily
    },
    {
      id: 'sales-by-location',
      kind: 'bar',
      title: 'Total Sales by Store Location',
      xAxisTitle: 'Store Location',
      yAxisTitle: 'Total Revenue ($)',
      points: views.byLocation
    },
    {
      id: 'sales-by-category',
      kind: 'bar',
      title: 'Total Sales by Product Category',
      xAxisTitle: 'Product Category',
      yAxisTitle: 'Total Revenue ($)',
      points: views.byCategory
    }
  ];
}
