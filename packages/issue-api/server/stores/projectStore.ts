import { ProjectModel } from "../models";
import type { Project } from "../suggestions/types";

export interface ProjectStore {
  getBySlug(organizationSlug: string, projectSlug: string): Promise<Project | null>;
}

export class MongoProjectStore implements ProjectStore {
  async getBySlug(organizationSlug: string, projectSlug: string): Promise<Project | null> {
    const doc = await ProjectModel.findOne({ organizationSlug, slug: projectSlug })
      .lean()
      .exec();
    if (!doc) return null;

    return {
      id: doc.id,
      slug: doc.slug,
      organization: { id: doc.organizationId, slug: doc.organizationSlug }
    };
  }
}
