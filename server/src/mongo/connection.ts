import mongoose from 'mongoose';
import { baseLogger as logger } from '../logger.js';

function redactUri(uri: string) {
  return uri.replace(/\/\/([^@/]+)@/, '//***@');
}

export async function connectMongo(uri: string) {
  mongoose.set('strictQuery', true);
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
  logger.info({ uri: redactUri(uri) }, 'Mongo connected');
}

export async function disconnectMongo() {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.connection.close();
  logger.info('Mongo disconnected');
}
