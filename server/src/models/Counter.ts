import mongoose from "mongoose";

type CounterRecord = {
  _id: string;
  seq: number;
};

const counterSchema = new mongoose.Schema<CounterRecord>({
  _id: { type: String, required: true },
  seq: { type: Number, required: true, default: 0 },
});

export const CounterModel = mongoose.model<CounterRecord>("Counter", counterSchema);
