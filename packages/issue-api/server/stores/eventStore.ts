import { EventModel } from "../models";
import { EventDataSchema, type StoredEvent } from "../suggestions/types";
import { logger } from "../logger";

export interface EventStore {
  getEventById(projectId: string, eventId: string): Promise<StoredEvent | null>;
}

export class MongoEventStore implements EventStore {
  async getEventById(projectId: string, eventId: string): Promise<StoredEvent | null> {
    const doc = await EventModel.findOne({ projectId, eventId }).lean().exec();
    if (!doc) return null;

    const parsed = EventDataSchema.safeParse(doc.data);
    if (!parsed.success) {
      // a payload we can't describe is as good as a missing event here
      logger.warn("[Events] stored event payload failed validation", {
        projectId,
        eventId,
        issues: parsed.error.issues.length
      });
      return null;
    }

    return { projectId, eventId, data: parsed.data };
  }
}
