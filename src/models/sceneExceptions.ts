import db from '../db';

export const sceneExceptionsModel = {
  getForShow(indexerId: number): string[] {
    const rows = db
      .prepare('SELECT name FROM show_scene_exceptions WHERE indexer_id = ? ORDER BY id')
      .all(indexerId) as { name: string }[];
    return rows.map((row) => row.name);
  },

  /** Returns false when the name was already present (names compare case-insensitively). */
  add(indexerId: number, name: string): boolean {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new Error('Scene exception name cannot be empty');
    }
    const result = db
      .prepare('INSERT OR IGNORE INTO show_scene_exceptions (indexer_id, name) VALUES (?, ?)')
      .run(indexerId, trimmed);
    return result.changes > 0;
  },

  /** Returns false when there was nothing to remove. */
  remove(indexerId: number, name: string): boolean {
    const result = db
      .prepare('DELETE FROM show_scene_exceptions WHERE indexer_id = ? AND name = ?')
      .run(indexerId, name.trim());
    return result.changes > 0;
  },

  removeAllForShow(indexerId: number): void {
    db.prepare('DELETE FROM show_scene_exceptions WHERE indexer_id = ?').run(indexerId);
  },
};
