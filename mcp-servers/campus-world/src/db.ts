import { MongoClient, Db, Collection } from "mongodb";
import type { SnapshotDocument } from "./snapshots.js";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function getDb(): Promise<Db> {
  if (db) return db;
  const uri = process.env.MONGO_URI || "mongodb://localhost:27017/campusworld";
  client = new MongoClient(uri);
  await client.connect();
  db = client.db();
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) await client.close();
  client = null;
  db = null;
}

export async function worldSnapshots(): Promise<Collection<SnapshotDocument>> {
  return (await getDb()).collection("world_snapshots");
}
