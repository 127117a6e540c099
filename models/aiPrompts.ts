// models/aiPrompts.ts
import mongoose, { Schema, Document, Model } from 'mongoose';
import { IAIPrompt, PROMPT_TYPES } from '../types';

export interface PromptDocument extends IAIPrompt, Document {
  createdAt: Date;
  updatedAt: Date;
}

// Operator-edited system prompts that replace the built-in stage prompts.
const promptSchema = new Schema<PromptDocument>({
  type: {
    type: String,
    required: true,
    unique: true,
    enum: [...PROMPT_TYPES]
  },
  text: {
    type: String,
    required: true
  },
  version: {
    type: Number,
    default: 1
  },
  active: {
    type: Boolean,
    default: true
  },
  description: String
}, {
  timestamps: true
});

const Prompt: Model<PromptDocument> = mongoose.model<PromptDocument>('Prompt', promptSchema);

export default Prompt;
