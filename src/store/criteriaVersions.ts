// src/store/criteriaVersions.ts
// Immutable criteria versions. Rows are only ever inserted.
//
// Tables: criteria_versions

import { nanoid } from "nanoid";
import type { CriteriaDefinition } from "../engine";
import type { CriteriaVersion } from "../criteria/versions";
import type { DbAdapter } from "../db/types";
import { ConfigurationError } from "../errors";
import { createLogger } from "../observability";
import { readCriteriaDefinition } from "./json";

const log = createLogger("store/criteriaVersions");

interface VersionRow {
  id: string;
  criteria_id: string;
  version: number;
  description: string | null;
  definition_json: string;
  created_at: number;
}

function rowToVersion(row: VersionRow): CriteriaVersion {
  const definition = readCriteriaDefinition(row.definition_json);
  if (!definition) {
    throw new ConfigurationError("Stored definition is unreadable", `criteria_versions.${row.id}`);
  }
  return {
    id: row.id,
    criteriaId: row.criteria_id,
    version: row.version,
    description: row.description,
    definition,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

export function createCriteriaVersionsStore(db: DbAdapter) {
  /** Store a definition already stamped with its version number */
  async function create(
    criteriaId: string,
    definition: CriteriaDefinition,
    description: string | null = null
  ): Promise<CriteriaVersion> {
    if (typeof definition.version !== "number") {
      throw new ConfigurationError("Definition has no version number", "version");
    }
    const id = nanoid(12);
    const now = Date.now();

    try {
      await db.run(
        `
        INSERT INTO criteria_versions (id, criteria_id, version, description, definition_json, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `,
        [id, criteriaId, definition.version, description, JSON.stringify(definition), now]
      );
    } catch (err) {
      log.error({ err, criteriaId, version: definition.version }, "Failed to create version");
      throw err;
    }

    return {
      id,
      criteriaId,
      version: definition.version,
      description,
      definition,
      createdAt: new Date(now).toISOString(),
    };
  }

  /** All versions, oldest first */
  async function list(criteriaId: string): Promise<CriteriaVersion[]> {
    const rows = await db.queryAll<VersionRow>(
      `SELECT * FROM criteria_versions WHERE criteria_id = ? ORDER BY version ASC`,
      [criteriaId]
    );
    return rows.map(rowToVersion);
  }

  async function get(criteriaId: string, version: number): Promise<CriteriaVersion | null> {
    const row = await db.queryOne<VersionRow>(
      `SELECT * FROM criteria_versions WHERE criteria_id = ? AND version = ?`,
      [criteriaId, version]
    );
    return row ? rowToVersion(row) : null;
  }

  async function latest(criteriaId: string): Promise<CriteriaVersion | null> {
    const row = await db.queryOne<VersionRow>(
      `SELECT * FROM criteria_versions WHERE criteria_id = ? ORDER BY version DESC LIMIT 1`,
      [criteriaId]
    );
    return row ? rowToVersion(row) : null;
  }

  async function numbers(criteriaId: string): Promise<number[]> {
    const rows = await db.queryAll<{ version: number }>(
      `SELECT version FROM criteria_versions WHERE criteria_id = ? ORDER BY version ASC`,
      [criteriaId]
    );
    return rows.map((r) => r.version);
  }

  return { create, list, get, latest, numbers };
}

export type CriteriaVersionsStore = ReturnType<typeof createCriteriaVersionsStore>;
