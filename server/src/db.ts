import { MongoClient, Db } from "mongodb";
import { log } from "./utils/logger";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectDB(uri: string | undefined, dbName: string): Promise<Db> {
  if (!uri) {
    throw new Error("MONGODB_URI environment variable is not set");
  }

  if (db) return db;

  client = new MongoClient(uri, {
    serverSelectionTimeoutMS: 10000,
    connectTimeoutMS: 10000,
  });
  await client.connect();

  // Verify connectivity
  await client.db(dbName).command({ ping: 1 });
  log.db(`Connected to MongoDB (${dbName})`);

  db = client.db(dbName);
  return db;
}

export async function isDBConnected(): Promise<boolean> {
  try {
    if (!client || !db) return false;
    await db.command({ ping: 1 });
    return true;
  } catch {
    return false;
  }
}

export async function disconnectDB(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    log.db("Disconnected from MongoDB");
  }
}
