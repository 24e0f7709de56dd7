import type { Pool } from 'pg';
import type { Subject } from '../../shared/types';

export interface SubjectDirectory {
  findById(subjectId: string): Promise<Subject | null>;
  listSubjects(): Promise<Subject[]>;
}

export class SubjectService implements SubjectDirectory {
  constructor(private db: Pool) {}

  async findById(subjectId: string): Promise<Subject | null> {
    const result = await this.db.query<{
      id: string;
      display_name: string | null;
      created_at: Date;
    }>(
      `SELECT id, display_name, created_at
       FROM subjects
       WHERE id = $1`,
      [subjectId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      id: row.id,
      displayName: row.display_name,
      createdAt: row.created_at,
    };
  }

  async listSubjects(): Promise<Subject[]> {
    const result = await this.db.query<{
      id: string;
      display_name: string | null;
      created_at: Date;
    }>(
      `SELECT id, display_name, created_at
       FROM subjects
       ORDER BY display_name NULLS LAST, created_at`
    );

    return result.rows.map((row) => ({
      id: row.id,
      displayName: row.display_name,
      createdAt: row.created_at,
    }));
  }
}

export class InMemorySubjectDirectory implements SubjectDirectory {
  private subjects = new Map<string, Subject>();

  constructor(seed: readonly Subject[] = []) {
    for (const subject of seed) {
      this.subjects.set(subject.id, subject);
    }
  }

  async findById(subjectId: string): Promise<Subject | null> {
    return this.subjects.get(subjectId) ?? null;
  }

  async listSubjects(): Promise<Subject[]> {
    return [...this.subjects.values()];
  }
}
