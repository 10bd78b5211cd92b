import mongoose, { type HydratedDocument } from 'mongoose';
import { Video, type IVideo, type NewVideoRecord, type VideoChanges, type VideoRecord } from '../models/index.js';

export interface ListOptions {
  limit?: number;
}

/**
 * Persistence boundary for video records. Lists are ordered newest first.
 */
export interface VideoRepository {
  findById(id: string): Promise<VideoRecord | null>;
  list(options?: ListOptions): Promise<VideoRecord[]>;
  count(): Promise<number>;
  create(input: NewVideoRecord): Promise<VideoRecord>;
  update(id: string, changes: VideoChanges): Promise<VideoRecord | null>;
  delete(id: string): Promise<VideoRecord | null>;
}

function toVideoRecord(doc: HydratedDocument<IVideo>): VideoRecord {
  return {
    id: doc._id.toString(),
    title: doc.title,
    description: doc.description ?? null,
    hashtags: doc.hashtags ?? null,
    embedUrl: doc.embedUrl,
    bannerPath: doc.bannerPath,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongooseVideoRepository implements VideoRepository {
  async findById(id: string): Promise<VideoRecord | null> {
    // Anything that is not an ObjectId cannot exist in the collection
    if (!mongoose.isValidObjectId(id)) {
      return null;
    }

    const doc = await Video.findById(id);
    return doc ? toVideoRecord(doc) : null;
  }

  async list(options: ListOptions = {}): Promise<VideoRecord[]> {
    const query = Video.find().sort({ createdAt: -1, _id: -1 });
    if (options.limit !== undefined) {
      query.limit(options.limit);
    }

    const docs = await query;
    return docs.map(toVideoRecord);
  }

  async count(): Promise<number> {
    return Video.countDocuments();
  }

  async create(input: NewVideoRecord): Promise<VideoRecord> {
    const doc = await Video.create(input);
    return toVideoRecord(doc);
  }

  async update(id: string, changes: VideoChanges): Promise<VideoRecord | null> {
    if (!mongoose.isValidObjectId(id)) {
      return null;
    }

    const doc = await Video.findByIdAndUpdate(
      id,
      { $set: changes },
      { new: true, runValidators: true }
    );
    return doc ? toVideoRecord(doc) : null;
  }

  async delete(id: string): Promise<VideoRecord | null> {
    if (!mongoose.isValidObjectId(id)) {
      return null;
    }

    const doc = await Video.findByIdAndDelete(id);
    return doc ? toVideoRecord(doc) : null;
  }
}
