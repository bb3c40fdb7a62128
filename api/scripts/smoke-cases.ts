export interface SmokeCase {
  name: string;
  params: Record<string, string>;
  auth?: boolean;
  /** Any of these counts as a pass. */
  expectStatus: readonly number[];
}

export const CASES: readonly SmokeCase[] = [
  { name: 'aapl-day', params: { ticker: 'AAPL', duration: 'day' }, expectStatus: [200] },
  { name: 'googl-hour', params: { ticker: 'GOOGL', duration: 'hour' }, expectStatus: [200] },
  { name: 'tsla-week', params: { ticker: 'TSLA', duration: 'week', size: '800x400' }, expectStatus: [200] },
  { name: 'msft-month', params: { ticker: 'MSFT', duration: 'month', size: '1200x600' }, expectStatus: [200] },
  // unknown symbols usually come back as an empty window (400), sometimes as 404
  { name: 'invalid-ticker', params: { ticker: 'INVALIDTICKER123' }, expectStatus: [400, 404] },
  { name: 'no-auth', params: { ticker: 'AAPL' }, auth: false, expectStatus: [401] },
];

export function isExpectedStatus(c: SmokeCase, status: number): boolean {
  return c.expectStatus.includes(status);
}
