import { CrmStats, LineSink } from '../types';
import { errorMessage } from '../utils/errors';
import { formatDateTime, formatDollars, toCents } from '../utils/format';
import { logger } from '../utils/logger';
import {
  CrmQueryClient,
  readNumber,
  readRecord,
  readString,
} from './graphql-client';

export const HEALTH_CHECK_QUERY = 'query HealthCheck { hello }';

export const CRM_STATS_QUERY = `
  query CrmStats {
    crmStats {
      totalCustomers
      totalOrders
      totalRevenue
    }
  }
`;

export interface StatsProvider {
  getStats(): Promise<CrmStats>;
}

/**
 * Where the report numbers came from. The database branch records which
 * GraphQL step failed and why.
 */
export type StatsOutcome =
  | { source: 'graphql'; stats: CrmStats }
  | { source: 'database'; stats: CrmStats; stage: 'health-check' | 'stats-query'; reason: string };

export type ReportResult =
  | {
      success: true;
      timestamp: string;
      method: 'graphql' | 'database_fallback';
      totalCustomers: number;
      totalOrders: number;
      totalRevenue: number;
    }
  | {
      success: false;
      timestamp: string;
      method: 'failed';
      error: string;
    };

export interface CrmReportServiceDeps {
  client: CrmQueryClient;
  stats: StatsProvider;
  sink: LineSink;
  now?: () => Date;
}

export function formatReportLine(timestamp: string, stats: CrmStats): string {
  return (
    `${timestamp} - Report: ${stats.totalCustomers} customers, ` +
    `${stats.totalOrders} orders, ${formatDollars(stats.totalRevenue)} revenue`
  );
}

const reportLogger = logger.child({ task: 'generate-crm-report' });

/**
 * Weekly CRM report: counts customers and orders and sums revenue, reading
 * through the GraphQL endpoint and falling back to the stores when the
 * endpoint is down or answers badly. Never throws.
 */
export class CrmReportService {
  private readonly client: CrmQueryClient;
  private readonly stats: StatsProvider;
  private readonly sink: LineSink;
  private readonly now: () => Date;

  constructor(deps: CrmReportServiceDeps) {
    this.client = deps.client;
    this.stats = deps.stats;
    this.sink = deps.sink;
    this.now = deps.now ?? (() => new Date());
  }

  async generate(): Promise<ReportResult> {
    const timestamp = formatDateTime(this.now());
    const lines: string[] = [];

    try {
      const outcome = await this.fetchStats(timestamp, lines);
      lines.push(...this.describe(timestamp, outcome));

      reportLogger.info('CRM report generated', {
        source: outcome.source,
        ...outcome.stats,
      });

      return {
        success: true,
        timestamp,
        method: outcome.source === 'graphql' ? 'graphql' : 'database_fallback',
        ...outcome.stats,
      };
    } catch (error) {
      const message = errorMessage(error);
      lines.push(`${timestamp} [FALLBACK] Database report generation also failed: ${message}`);
      reportLogger.error('CRM report generation failed', error);

      return { success: false, timestamp, method: 'failed', error: message };
    } finally {
      await this.sink.append(lines);
    }
  }

  /**
   * Resolves to the GraphQL branch or the database branch; rejects only
   * when the database read fails too.
   */
  async fetchStats(timestamp: string, lines: string[]): Promise<StatsOutcome> {
    let greeting: string;
    try {
      const data = readRecord(await this.client.execute(HEALTH_CHECK_QUERY), 'data');
      greeting = readString(data, 'hello', 'data');
    } catch (error) {
      const reason = errorMessage(error);
      lines.push(`${timestamp} GraphQL endpoint check failed: ${reason}`);
      reportLogger.warn('GraphQL health check failed, using database', { reason });
      return this.fromDatabase('health-check', reason);
    }

    lines.push(`${timestamp} GraphQL endpoint responsive: ${greeting}`);

    try {
      const data = readRecord(await this.client.execute(CRM_STATS_QUERY), 'data');
      const crmStats = readRecord(data.crmStats, 'data.crmStats');

      return {
        source: 'graphql',
        stats: {
          totalCustomers: readNumber(crmStats, 'totalCustomers', 'data.crmStats'),
          totalOrders: readNumber(crmStats, 'totalOrders', 'data.crmStats'),
          totalRevenue: toCents(readNumber(crmStats, 'totalRevenue', 'data.crmStats')),
        },
      };
    } catch (error) {
      const reason = errorMessage(error);
      lines.push(`${timestamp} GraphQL report generation failed: ${reason}`);
      reportLogger.warn('GraphQL stats query failed, using database', { reason });
      return this.fromDatabase('stats-query', reason);
    }
  }

  private async fromDatabase(
    stage: 'health-check' | 'stats-query',
    reason: string
  ): Promise<StatsOutcome> {
    const stats = await this.stats.getStats();
    return { source: 'database', stats, stage, reason };
  }

  private describe(timestamp: string, outcome: StatsOutcome): string[] {
    const { stats } = outcome;
    const prefix = outcome.source === 'database' ? `${timestamp} [FALLBACK]` : timestamp;
    const lines: string[] = [];

    if (outcome.source === 'database') {
      lines.push(`${prefix} Using direct database access`);
    }

    lines.push(formatReportLine(timestamp, stats));
    lines.push(
      outcome.source === 'graphql'
        ? `${prefix} CRM report generated successfully via GraphQL`
        : `${prefix} CRM report generated successfully via database`
    );

    if (stats.totalOrders > 0) {
      const average = Math.round(stats.totalRevenue / stats.totalOrders);
      lines.push(`${prefix} Average order value: ${formatDollars(average)}`);
    }

    return lines;
  }
}
