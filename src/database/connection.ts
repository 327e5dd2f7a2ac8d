import neo4j, { Driver, Session } from 'neo4j-driver';
import { config, Neo4jConfig } from '../utils/config';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('database');

let driver: Driver | null = null;

/**
 * Minimal query surface the graph store needs: run one statement, get plain records back
 */
export interface CypherRunner {
  run(query: string, params?: Record<string, unknown>): Promise<Record<string, unknown>[]>;
}

export function createDatabaseConnection(neo4jConfig: Neo4jConfig = config.neo4j): Driver {
  if (driver) {
    return driver;
  }

  driver = neo4j.driver(
    neo4jConfig.uri,
    neo4j.auth.basic(neo4jConfig.username, neo4jConfig.password),
    {
      maxConnectionPoolSize: 20,
      connectionTimeout: 30000,
    }
  );

  return driver;
}

export function getDatabaseConnection(): Driver {
  if (!driver) {
    return createDatabaseConnection();
  }
  return driver;
}

export async function testDatabaseConnection(): Promise<void> {
  const connection = getDatabaseConnection();
  try {
    await connection.verifyConnectivity({ database: config.neo4j.database });
    logger.info('Database connection established successfully', { uri: config.neo4j.uri });
  } catch (err) {
    logger.error('Failed to establish database connection', {
      uri: config.neo4j.uri,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

export async function closeDatabaseConnection(): Promise<void> {
  if (driver) {
    logger.info('Closing database connection');
    await driver.close();
    driver = null;
  }
}

export function openSession(database: string = config.neo4j.database): Session {
  return getDatabaseConnection().session({ database });
}

/**
 * Runner over one session: statements go out one after another on the same connection
 */
export function createSessionRunner(session: Session): CypherRunner {
  return {
    async run(query: string, params: Record<string, unknown> = {}) {
      const result = await session.run(query, params);
      return result.records.map(record => record.toObject());
    },
  };
}
