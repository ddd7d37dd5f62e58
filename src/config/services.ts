import dotenv from 'dotenv';
dotenv.config();

export const serverConfig = {
  port: parseInt(process.env.PORT || '5000', 10),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',
  environment: process.env.NODE_ENV || 'development',
};

export const groqConfig = {
  apiKey: process.env.GROQ_API_KEY || '',
  baseURL: process.env.GROQ_BASE_URL || undefined,
};

export const interviewConfig = {
  defaultModel: process.env.INTERVIEW_MODEL || 'llama-3.3-70b-versatile',
  defaultQuestionCount: 3,
  minQuestions: 1,
  maxQuestions: 10,
  models: [
    'llama-3.3-70b-versatile',
    'llama-3.1-8b-instant',
    'mixtral-8x7b-32768',
    'gemma2-9b-it',
  ],
};

export const databaseConfig = {
  // Transcripts are only persisted when a URI is configured.
  mongoUri: process.env.MONGODB_URI || '',
};

export const redisConfig = {
  host: process.env.REDIS_HOST || 'localhost',
  port: parseInt(process.env.REDIS_PORT || '6379', 10),
  password: process.env.REDIS_PASSWORD || undefined,
  sessionTtlSeconds: 3600,
};

if (!groqConfig.apiKey) {
  console.warn('⚠️  Groq API key is missing. Requests must send an x-groq-api-key header.');
}

if (!databaseConfig.mongoUri) {
  console.warn('⚠️  MONGODB_URI is not set. Interview transcripts will not be saved.');
}
