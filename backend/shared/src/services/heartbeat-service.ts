import { LineSink } from '../types';
import { errorMessage } from '../utils/errors';
import { formatDayFirstDateTime } from '../utils/format';
import { logger } from '../utils/logger';
import { CrmQueryClient, readRecord, readString } from './graphql-client';
import { HEALTH_CHECK_QUERY } from './report-service';

export interface HeartbeatResult {
  timestamp: string;
  graphqlResponsive: boolean;
}

export interface HeartbeatServiceDeps {
  client: CrmQueryClient;
  sink: LineSink;
  now?: () => Date;
}

export class HeartbeatService {
  constructor(private readonly deps: HeartbeatServiceDeps) {}

  async run(): Promise<HeartbeatResult> {
    const timestamp = formatDayFirstDateTime(this.deps.now ? this.deps.now() : new Date());
    const lines = [`${timestamp} CRM is alive`];
    let graphqlResponsive = false;

    try {
      const data = readRecord(await this.deps.client.execute(HEALTH_CHECK_QUERY), 'data');
      readString(data, 'hello', 'data');
      graphqlResponsive = true;
      lines.push(`${timestamp} GraphQL endpoint is responsive`);
    } catch (error) {
      lines.push(`${timestamp} GraphQL endpoint check failed: ${errorMessage(error)}`);
      logger.warn('Heartbeat GraphQL check failed', { task: 'log-heartbeat', reason: errorMessage(error) });
    }

    await this.deps.sink.append(lines);
    return { timestamp, graphqlResponsive };
  }
}
