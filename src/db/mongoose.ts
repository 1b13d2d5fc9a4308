/**
 * MongoDB connection (mongoose default connection)
 */

import mongoose from 'mongoose';

export async function connectMongo(url: string, dbName: string): Promise<typeof mongoose> {
  mongoose.set('strictQuery', true);
  await mongoose.connect(url, { dbName, serverSelectionTimeoutMS: 10_000 });
  console.log(`[DB] Connected to MongoDB (${dbName})`);
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
  console.log('[DB] MongoDB disconnected');
}
