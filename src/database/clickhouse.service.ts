import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClickHouseClient, ClickHouseSettings, createClient } from '@clickhouse/client';
import { SCHEMAS } from './schemas';

@Injectable()
export class ClickHouseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ClickHouseService.name);
  private readonly client: ClickHouseClient;
  private readonly database: string;

  constructor(private readonly configService: ConfigService) {
    this.database = this.configService.get<string>('CLICKHOUSE_DATABASE', 'snapshots');
    this.client = createClient({
      url: this.configService.get<string>('CLICKHOUSE_HOST', 'http://localhost:8123'),
      username: this.configService.get<string>('CLICKHOUSE_USER', 'default'),
      password: this.configService.get<string>('CLICKHOUSE_PASSWORD', ''),
      database: this.database,
    });
  }

  async onModuleInit() {
    await this.initDatabase();
  }

  async onModuleDestroy() {
    await this.client.close();
  }

  private async initDatabase() {
    // The client is bound to the target database, so create it from `default` first
    const bootstrap = createClient({
      url: this.configService.get<string>('CLICKHOUSE_HOST', 'http://localhost:8123'),
      username: this.configService.get<string>('CLICKHOUSE_USER', 'default'),
      password: this.configService.get<string>('CLICKHOUSE_PASSWORD', ''),
    });
    try {
      await bootstrap.command({
        query: `CREATE DATABASE IF NOT EXISTS ${this.database}`,
      });
    } finally {
      await bootstrap.close();
    }

    for (const [name, schema] of Object.entries(SCHEMAS)) {
      const query = schema.replace(/{database}/g, this.database);
      await this.client.command({ query });
      this.logger.debug(`Ensured table ${name}`);
    }
  }

  async query<T>(sql: string, params?: Record<string, unknown>): Promise<T[]> {
    const result = await this.client.query({
      query: sql,
      query_params: params,
      format: 'JSONEachRow',
    });
    return result.json<T>();
  }

  async insert<T>(table: string, values: T[]): Promise<void> {
    if (values.length === 0) return;
    await this.client.insert<T>({
      table,
      values,
      format: 'JSONEachRow',
    });
  }

  async command(
    sql: string,
    params?: Record<string, unknown>,
    settings?: ClickHouseSettings,
  ): Promise<void> {
    await this.client.command({
      query: sql,
      query_params: params,
      clickhouse_settings: settings,
    });
  }
}
