import { Inject, Injectable } from '@nestjs/common';
import { asc, eq, max } from 'drizzle-orm';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import {
  projects,
  sections,
  type NewProject,
  type NewSection,
  type Project,
  type Section,
} from '../../database/schema';
import type { ProjectChanges, ProjectRepository } from './project.repository';

@Injectable()
export class DrizzleProjectRepository implements ProjectRepository {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {}

  async create(project: NewProject): Promise<Project> {
    await this.db.insert(projects).values(project);
    return this.findExisting(project.id);
  }

  async findById(id: string): Promise<Project | null> {
    const [project] = await this.db
      .select()
      .from(projects)
      .where(eq(projects.id, id))
      .limit(1);

    return project ?? null;
  }

  async update(id: string, changes: ProjectChanges): Promise<Project> {
    await this.db.update(projects).set(changes).where(eq(projects.id, id));
    return this.findExisting(id);
  }

  async createSection(section: NewSection): Promise<Section> {
    await this.db.insert(sections).values(section);

    const [created] = await this.db
      .select()
      .from(sections)
      .where(eq(sections.id, section.id))
      .limit(1);
    if (!created) {
      throw new Error(`Section ${section.id} was not persisted`);
    }
    return created;
  }

  async findSections(projectId: string): Promise<Section[]> {
    return this.db
      .select()
      .from(sections)
      .where(eq(sections.projectId, projectId))
      .orderBy(asc(sections.orderNum));
  }

  async maxSectionOrder(projectId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: max(sections.orderNum) })
      .from(sections)
      .where(eq(sections.projectId, projectId));

    return row?.value ?? 0;
  }

  private async findExisting(id: string): Promise<Project> {
    const project = await this.findById(id);
    if (!project) {
      throw new Error(`Project ${id} was not persisted`);
    }
    return project;
  }
}
