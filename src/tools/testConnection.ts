import type { CircuitState } from "../circuit.js";
import type { DatabaseManager } from "../db.js";
import { QueryError } from "../errors.js";
import { formatDuration } from "../utils.js";

export interface ConnectionStatus {
  database: string;
  ok: boolean;
  latencyMs: number;
  circuit: CircuitState;
  recentFailures: number;
  error: string | null;
}

/**
 * Round-trip a trivial statement. Query failures are reported in the
 * status; configuration errors (unknown database) still throw.
 */
export async function testConnection(
  manager: DatabaseManager,
  database: string
): Promise<ConnectionStatus> {
  const name = manager.resolveName(database);
  try {
    const result = await manager.execute(name, "SELECT 1");
    return {
      database: name,
      ok: true,
      latencyMs: result.durationMs,
      circuit: manager.circuitState(name),
      recentFailures: manager.recentFailures(name),
      error: null,
    };
  } catch (error) {
    if (!(error instanceof QueryError)) throw error;
    return {
      database: name,
      ok: false,
      latencyMs: error.duration_ms,
      circuit: manager.circuitState(name),
      recentFailures: manager.recentFailures(name),
      error: error.message,
    };
  }
}

export function formatConnectionStatus(status: ConnectionStatus): string {
  return JSON.stringify(
    {
      database: status.database,
      status: status.ok ? "connected" : "failed",
      latency: formatDuration(status.latencyMs),
      circuit: status.circuit,
      recent_failures: status.recentFailures,
      ...(status.error ? { error: status.error } : {}),
    },
    null,
    2
  );
}
