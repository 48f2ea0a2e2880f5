import type {
  NewProject,
  NewSection,
  Project,
  Section,
} from '../../database/schema';

export type ProjectChanges = Partial<
  Pick<NewProject, 'rcStoragePath' | 'rcContext' | 'status'>
>;

export interface ProjectRepository {
  create(project: NewProject): Promise<Project>;
  findById(id: string): Promise<Project | null>;
  update(id: string, changes: ProjectChanges): Promise<Project>;
  createSection(section: NewSection): Promise<Section>;
  /** Ordered by orderNum */
  findSections(projectId: string): Promise<Section[]>;
  /** Highest orderNum of the project, 0 when it has no section */
  maxSectionOrder(projectId: string): Promise<number>;
}
