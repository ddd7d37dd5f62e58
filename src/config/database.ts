import mongoose from 'mongoose';
import { databaseConfig } from './services';

/**
 * Connects to MongoDB when a URI is configured.
 * Returns false when transcript persistence is disabled.
 */
export const connectDatabase = async (): Promise<boolean> => {
  const mongoUri = databaseConfig.mongoUri;
  if (!mongoUri) {
    return false;
  }

  try {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`🔧 MONGODB CONNECTION`);
    console.log(`${'='.repeat(60)}`);
    console.log(`MongoDB URI: ${mongoUri.substring(0, 30)}...${mongoUri.slice(-20)}`);
    console.log(`${'='.repeat(60)}\n`);

    await mongoose.connect(mongoUri, {
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4, // Use IPv4, skip trying IPv6
      retryWrites: true,
      maxPoolSize: 10,
      minPoolSize: 2,
    });

    mongoose.connection.on('error', (error) => {
      console.error('❌ MongoDB connection error:', error);
    });

    mongoose.connection.on('disconnected', () => {
      console.warn('⚠️ MongoDB disconnected');
    });

    return true;
  } catch (error) {
    console.error('❌ Failed to connect to MongoDB:', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
};
