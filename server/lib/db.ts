import postgres from "postgres";
import type { ConnectionConfig, SslMode } from "./config";

export interface ConnectionDetails {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string | undefined;
  sslMode: SslMode;
  statementTimeout?: string;
}

const APP_NAME = "tsql-autocomplete";

export function formatAppName(connectionId?: string): string {
  if (!connectionId) return APP_NAME;
  // PostgreSQL application_name has a 63 character limit
  const maxLen = 63 - `${APP_NAME}/`.length;
  const truncated = connectionId.length > maxLen ? connectionId.slice(0, maxLen) : connectionId;
  return `${APP_NAME}/${truncated}`;
}

export function toConnectionDetails(connection: ConnectionConfig): ConnectionDetails {
  return {
    host: connection.host,
    port: connection.port,
    database: connection.database,
    username: connection.username,
    password: connection.password,
    sslMode: connection.ssl_mode,
    statementTimeout: "10s",
  };
}

export function createClient(details: ConnectionDetails, connectionId?: string) {
  return postgres({
    host: details.host,
    port: details.port,
    database: details.database,
    username: details.username,
    password: details.password,
    ssl: details.sslMode === "disable" ? false : details.sslMode,
    connect_timeout: 10,
    max: 1,
    onnotice: () => {},
    connection: {
      application_name: formatAppName(connectionId),
      ...(details.statementTimeout && { statement_timeout: details.statementTimeout }),
    },
  });
}

export async function withConnection<T>(
  details: ConnectionDetails,
  fn: (sql: ReturnType<typeof postgres>) => Promise<T>,
  connectionId?: string
): Promise<T> {
  const client = createClient(details, connectionId);

  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}
