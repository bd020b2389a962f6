import mongoose from 'mongoose';
import { config } from './env';

const connectDB = async (): Promise<void> => {
  try {
    await mongoose.connect(config.mongoUri);

    console.log('✅ MongoDB connected successfully');
  } catch (error) {
    console.error('❌ MongoDB connection error:', error);

    if (config.nodeEnv === 'production') {
      process.exit(1);
    }
    console.log('⚠️  Continuing without a database; every leave request call will fail until MONGODB_URI is reachable');
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  console.log('🔌 MongoDB disconnected');
};

export default connectDB;
