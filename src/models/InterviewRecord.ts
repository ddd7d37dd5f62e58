import mongoose, { Schema } from 'mongoose';

/** Stored shape of a finished interview, one document per session. */
export interface IInterviewRecord {
  participant: string;
  job_title: string;
  questions: string[];
  answers: string[];
  feedback: Array<string | null>;
  evaluation: string;
  model: string;
  timestamp: string;
}

const InterviewRecordSchema = new Schema<IInterviewRecord>(
  {
    participant: {
      type: String,
      default: 'Anonymous',
    },
    job_title: {
      type: String,
      required: true,
    },
    questions: [{
      type: String,
    }],
    answers: [{
      type: String,
    }],
    // null where feedback could not be generated
    feedback: [{
      type: String,
    }],
    evaluation: {
      type: String,
      required: true,
    },
    model: {
      type: String,
      required: true,
    },
    // ISO-8601 UTC string, kept as written so legacy values survive a read.
    timestamp: {
      type: String,
      required: true,
      index: true,
    },
  },
  {
    collection: 'interviews',
    timestamps: true,
  }
);

export default mongoose.model<IInterviewRecord>('InterviewRecord', InterviewRecordSchema);
