// backend/services/hero/src/models/Hero.ts
import { Schema, model } from "mongoose";

export interface HeroDocument {
  dateCreated: Date;
  dateLastUpdated: Date;

  name: string;

  // null = the source did not report a usable value
  intelligence: number | null;
  strength: number | null;
  speed: number | null;
  power: number | null;
}

const HeroSchema = new Schema<HeroDocument>(
  {
    name: { type: String, required: true },
    intelligence: { type: Number, default: null },
    strength: { type: Number, default: null },
    speed: { type: Number, default: null },
    power: { type: Number, default: null },
  },
  {
    strict: true,
    versionKey: false,
    timestamps: { createdAt: "dateCreated", updatedAt: "dateLastUpdated" },
  }
);

// Exact, case-sensitive: "Batman" and "batman" are different rows.
HeroSchema.index({ name: 1 }, { unique: true, name: "uniq_name" });

const HeroModel = model<HeroDocument>("Hero", HeroSchema);
export default HeroModel;
