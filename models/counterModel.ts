// models/counterModel.ts
import mongoose, { Schema, Model } from 'mongoose';

// One document per sequence. `seq` only ever moves forward via atomic $inc.
interface ICounter {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<ICounter>({
  _id: { type: String, required: true },
  seq: { type: Number, required: true, default: 0 }
}, { versionKey: false });

const Counter: Model<ICounter> = mongoose.model<ICounter>('Counter', counterSchema);

export default Counter;
