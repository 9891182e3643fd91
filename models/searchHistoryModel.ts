// models/searchHistoryModel.ts
import mongoose, { Schema, Document, Model } from 'mongoose';
import { SearchType } from '../types';

export interface ISearchHistory {
  entryId: number; // Sequential, assigned from the counter collection
  searchType: SearchType;
  city?: string;
  latitude?: number;
  longitude?: number;
  forecastDays?: number;
  responseData: string; // JSON string of the provider response
  timestamp: Date;
}

export interface SearchHistoryDocument extends ISearchHistory, Document {}

const searchHistorySchema = new Schema<SearchHistoryDocument>({
  entryId: { type: Number, required: true, unique: true, index: true },
  searchType: { type: String, required: true, enum: ['city', 'coordinates', 'forecast'] },
  city: { type: String, maxlength: 100 },
  latitude: { type: Number },
  longitude: { type: Number },
  forecastDays: { type: Number, min: 1, max: 5 },
  responseData: { type: String, required: true },
  timestamp: { type: Date, required: true, default: Date.now }
}, {
  collection: 'search_history',
  versionKey: false
});

// Listing is always newest first
searchHistorySchema.index({ timestamp: -1, entryId: -1 });

const SearchHistory: Model<SearchHistoryDocument> = mongoose.model<SearchHistoryDocument>('SearchHistory', searchHistorySchema);

export default SearchHistory;
