import mongoose, { Schema } from 'mongoose';

export interface IVideo {
  title: string;
  description: string | null;
  hashtags: string | null;
  embedUrl: string; // submitted as streamtape_url
  bannerPath: string;
  createdAt: Date;
  updatedAt: Date;
}

const videoSchema = new Schema<IVideo>(
  {
    title: {
      type: String,
      required: true,
      maxlength: 255,
      index: true,
    },
    description: {
      type: String,
      default: null,
    },
    hashtags: {
      type: String,
      default: null,
    },
    embedUrl: {
      type: String,
      required: true,
    },
    bannerPath: {
      type: String,
      required: true,
    },
    // Timestamps come from VideoService so the clock stays injectable
    createdAt: {
      type: Date,
      required: true,
      immutable: true,
    },
    updatedAt: {
      type: Date,
      required: true,
    },
  },
  {
    collection: 'videos',
  }
);

videoSchema.index({ createdAt: -1 });

export const Video = mongoose.model<IVideo>('Video', videoSchema);
