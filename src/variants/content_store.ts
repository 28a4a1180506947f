import type { DatabaseService } from "../database/database_service.ts";
import type { SqlExecutor } from "../database/types.ts";
import { ContentNotFoundError } from "./errors.ts";
import type { ContentItem, Variant } from "./types.ts";

type VariantRow = {
  id: number;
  templateId: number;
  text: string;
  weight: number;
  active: number;
  position: number;
};

type ContentItemRow = {
  id: number;
  text: string;
  mediaRefs: string;
};

/**
 * Input for adding a variant to a template.
 */
export interface NewVariant {
  text: string;
  weight?: number;
  active?: boolean;
  position?: number;
}

/**
 * Options for configuring the ContentStore.
 */
export interface ContentStoreOptions {
  db: DatabaseService;
}

/**
 * SQLite-backed access to templates, their variants and fixed content items.
 *
 * Reads accept an optional executor so they can run inside the scheduler's
 * job-creation transaction.
 */
export class ContentStore {
  private readonly db: DatabaseService;

  constructor(options: ContentStoreOptions) {
    this.db = options.db;
  }

  // ============== Templates & Variants ==============

  async createTemplate(name: string): Promise<number> {
    const result = await this.db.execute(
      "INSERT INTO templates (name) VALUES (?)",
      [name],
    );
    return result.lastInsertRowId;
  }

  async templateExists(
    templateId: number,
    executor: SqlExecutor = this.db,
  ): Promise<boolean> {
    const row = await executor.queryOne<{ id: number }>(
      "SELECT id FROM templates WHERE id = ?",
      [templateId],
    );
    return row !== null;
  }

  /**
   * @throws ContentNotFoundError if the template does not exist
   */
  async addVariant(templateId: number, variant: NewVariant): Promise<Variant> {
    if (!(await this.templateExists(templateId))) {
      throw new ContentNotFoundError("template", templateId);
    }

    const rows = await this.db.transaction((tx) =>
      tx.queryAll<VariantRow>(
        `INSERT INTO variants (templateId, text, weight, active, position)
         VALUES (?, ?, ?, ?, ?)
         RETURNING id, templateId, text, weight, active, position`,
        [
          templateId,
          variant.text,
          variant.weight ?? 1,
          variant.active === false ? 0 : 1,
          variant.position ?? 0,
        ],
      )
    );
    return rowToVariant(rows[0]);
  }

  async setVariantActive(variantId: number, active: boolean): Promise<void> {
    const result = await this.db.execute(
      "UPDATE variants SET active = ? WHERE id = ?",
      [active ? 1 : 0, variantId],
    );
    if (result.changes === 0) {
      throw new ContentNotFoundError("variant", variantId);
    }
  }

  /**
   * Active variants of a template, ordered by id.
   */
  async getActiveVariants(
    templateId: number,
    executor: SqlExecutor = this.db,
  ): Promise<Variant[]> {
    const rows = await executor.queryAll<VariantRow>(
      `SELECT id, templateId, text, weight, active, position
       FROM variants WHERE templateId = ? AND active = 1 ORDER BY id`,
      [templateId],
    );
    return rows.map(rowToVariant);
  }

  async getVariant(
    variantId: number,
    executor: SqlExecutor = this.db,
  ): Promise<Variant | null> {
    const row = await executor.queryOne<VariantRow>(
      `SELECT id, templateId, text, weight, active, position
       FROM variants WHERE id = ?`,
      [variantId],
    );
    return row ? rowToVariant(row) : null;
  }

  // ============== Content Items ==============

  async createContentItem(text: string, mediaRefs: string[] = []): Promise<ContentItem> {
    const result = await this.db.execute(
      "INSERT INTO contentItems (text, mediaRefs) VALUES (?, ?)",
      [text, JSON.stringify(mediaRefs)],
    );
    return { id: result.lastInsertRowId, text, mediaRefs };
  }

  async getContentItem(
    contentItemId: number,
    executor: SqlExecutor = this.db,
  ): Promise<ContentItem | null> {
    const row = await executor.queryOne<ContentItemRow>(
      "SELECT id, text, mediaRefs FROM contentItems WHERE id = ?",
      [contentItemId],
    );
    return row
      ? { id: row.id, text: row.text, mediaRefs: parseMediaRefs(row.mediaRefs) }
      : null;
  }

  /**
   * Fixed content item of a schedule, or null for template-based schedules
   * and dangling references.
   */
  async getContentItemForSchedule(
    scheduleId: number,
    executor: SqlExecutor = this.db,
  ): Promise<ContentItem | null> {
    const row = await executor.queryOne<ContentItemRow>(
      `SELECT c.id, c.text, c.mediaRefs
       FROM schedules s JOIN contentItems c ON c.id = s.contentItemId
       WHERE s.id = ?`,
      [scheduleId],
    );
    return row
      ? { id: row.id, text: row.text, mediaRefs: parseMediaRefs(row.mediaRefs) }
      : null;
  }
}

function rowToVariant(row: VariantRow): Variant {
  return {
    id: row.id,
    templateId: row.templateId,
    text: row.text,
    weight: row.weight,
    active: row.active === 1,
    position: row.position,
  };
}

function parseMediaRefs(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((ref): ref is string => typeof ref === "string");
}
