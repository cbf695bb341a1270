import { PoolConfig } from 'pg';

export interface DatabaseConfigProps {
  readonly connectionString: string | undefined;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly ssl: boolean;
  readonly max: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;
}

/**
 * Connection settings from `POSTGRES_*` variables. `DATABASE_URL`, when set,
 * takes precedence over host, port, user, password and database.
 */
export class DatabaseConfig {
  constructor(private readonly props: DatabaseConfigProps) {}

  static fromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    return new DatabaseConfig({
      connectionString: env.DATABASE_URL || undefined,
      host: env.POSTGRES_HOST ?? 'localhost',
      port: DatabaseConfig.parseInteger(env.POSTGRES_PORT, 5432, 'POSTGRES_PORT'),
      user: env.POSTGRES_USER ?? 'postgres',
      password: env.POSTGRES_PASSWORD ?? '',
      database: env.POSTGRES_DB ?? 'parking',
      ssl: env.POSTGRES_SSL === 'true',
      max: DatabaseConfig.parseInteger(env.POSTGRES_POOL_MAX, 10, 'POSTGRES_POOL_MAX'),
      idleTimeoutMillis: DatabaseConfig.parseInteger(env.POSTGRES_IDLE_TIMEOUT, 30_000, 'POSTGRES_IDLE_TIMEOUT'),
      connectionTimeoutMillis: DatabaseConfig.parseInteger(
        env.POSTGRES_CONNECTION_TIMEOUT,
        5_000,
        'POSTGRES_CONNECTION_TIMEOUT',
      ),
    });
  }

  private static parseInteger(
    value: string | undefined,
    fallback: number,
    key: string,
  ): number {
    if (value === undefined || value === '') {
      return fallback;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new Error(`Invalid integer value for ${key}: ${value}`);
    }

    return parsed;
  }

  toPoolConfig(): PoolConfig {
    const pooling = {
      ssl: this.props.ssl || undefined,
      max: this.props.max,
      idleTimeoutMillis: this.props.idleTimeoutMillis,
      connectionTimeoutMillis: this.props.connectionTimeoutMillis,
      application_name: 'parking-booking-core',
    };

    if (this.props.connectionString) {
      return { connectionString: this.props.connectionString, ...pooling };
    }

    return {
      host: this.props.host,
      port: this.props.port,
      user: this.props.user,
      password: this.props.password,
      database: this.props.database,
      ...pooling,
    };
  }

  get database(): string {
    return this.props.database;
  }
}
