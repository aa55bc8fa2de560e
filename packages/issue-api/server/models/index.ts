import mongoose from "mongoose";

export async function connectMongo(uri: string) {
  await mongoose.connect(uri);
}

export type ProjectDoc = {
  id: string;
  slug: string;
  organizationId: string;
  organizationSlug: string;
};

export type EventDoc = {
  projectId: string;
  eventId: string;
  data: unknown;
  receivedAt?: number;
};

export type CacheEntryDoc = {
  key: string;
  value: string;
  expiresAt: Date;
};

const ProjectSchema = new mongoose.Schema<ProjectDoc>(
  {
    id: { type: String, required: true, unique: true },
    slug: { type: String, required: true },
    organizationId: { type: String, required: true, index: true },
    organizationSlug: { type: String, required: true }
  },
  { timestamps: true }
);
ProjectSchema.index({ organizationSlug: 1, slug: 1 }, { unique: true });

const EventSchema = new mongoose.Schema<EventDoc>(
  {
    projectId: { type: String, required: true },
    eventId: { type: String, required: true },
    data: { type: mongoose.Schema.Types.Mixed, required: true },
    receivedAt: Number
  },
  { timestamps: true }
);
EventSchema.index({ projectId: 1, eventId: 1 }, { unique: true });

const CacheEntrySchema = new mongoose.Schema<CacheEntryDoc>({
  key: { type: String, required: true, unique: true },
  value: { type: String, required: true },
  // mongod's TTL monitor drops the document once expiresAt passes
  expiresAt: { type: Date, required: true, index: { expires: 0 } }
});

export const ProjectModel = mongoose.model<ProjectDoc>("FaultlineProject", ProjectSchema);
export const EventModel = mongoose.model<EventDoc>("FaultlineEvent", EventSchema);
export const CacheEntryModel = mongoose.model<CacheEntryDoc>(
  "FaultlineCacheEntry",
  CacheEntrySchema
);
