// src/models/Product.ts
import mongoose, { Schema, Types } from "mongoose";

export interface IProduct {
  _id: Types.ObjectId;
  slug: string;
  name: string;
  description: string;
  price: number;
  originalPrice?: number;
  currency: string;
  stock: number;
  category: string;
  images: string[];
  benefits: string[];
  active: boolean;
  rating: number;
  reviewCount: number;
  story?: string;
  ingredients?: string;
  brewTempC?: number;
  brewTimeMin?: number;
  createdAt: Date;
  updatedAt: Date;
}

const ProductSchema = new Schema<IProduct>(
  {
    slug: { type: String, required: true, unique: true, trim: true, lowercase: true },
    name: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    price: { type: Number, required: true, min: 0 },
    originalPrice: { type: Number, min: 0 },
    currency: { type: String, default: "INR", uppercase: true },
    // decremented only through conditional $inc, see ProductRepository.decrementStock
    stock: {
      type: Number,
      required: true,
      min: 0,
      validate: { validator: Number.isInteger, message: "stock must be an integer" },
    },
    category: { type: String, required: true, index: true },
    images: { type: [String], default: [] },
    benefits: { type: [String], default: [] },
    active: { type: Boolean, default: true, index: true },
    rating: { type: Number, default: 0, min: 0, max: 5 },
    reviewCount: { type: Number, default: 0, min: 0 },
    story: { type: String },
    ingredients: { type: String },
    brewTempC: { type: Number },
    brewTimeMin: { type: Number },
  },
  { timestamps: true, collection: "products" }
);

ProductSchema.index({ active: 1, category: 1, createdAt: -1 });
ProductSchema.index({ active: 1, price: 1 });

export default mongoose.model<IProduct>("Product", ProductSchema);
