import { Collection, Db } from "mongodb";
import type { ChatSession, ChatSessionDocument } from "../types/house";

const COLLECTION = "chat_sessions";

export interface ChatSessionStore {
  get(id: string): Promise<ChatSession | null>;
  save(session: ChatSession): Promise<void>;
  delete(id: string): Promise<void>;
}

export class MongoChatSessionStore implements ChatSessionStore {
  private readonly sessions: Collection<ChatSessionDocument>;

  constructor(db: Db) {
    this.sessions = db.collection<ChatSessionDocument>(COLLECTION);
  }

  async get(id: string): Promise<ChatSession | null> {
    const doc = await this.sessions.findOne({ _id: id });
    if (!doc) return null;
    const { _id, ...rest } = doc;
    return { ...rest, id: _id };
  }

  async save({ id, ...rest }: ChatSession): Promise<void> {
    await this.sessions.replaceOne({ _id: id }, rest, { upsert: true });
  }

  async delete(id: string): Promise<void> {
    await this.sessions.deleteOne({ _id: id });
  }
}
