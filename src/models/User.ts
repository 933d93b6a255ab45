// src/models/User.ts
import mongoose, { Schema, Types } from "mongoose";
import type { UserRole } from "../types/domain";

export interface IAddress {
  _id: Types.ObjectId;
  line1: string;
  line2?: string;
  city: string;
  state: string;
  pincode: string;
  country: string;
  isDefault: boolean;
}

export interface IUser {
  _id: Types.ObjectId;
  externalId: string;
  phone?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  role: UserRole;
  addresses: IAddress[];
  createdAt: Date;
  updatedAt: Date;
}

const AddressSchema = new Schema<IAddress>({
  line1: { type: String, required: true },
  line2: { type: String },
  city: { type: String, required: true },
  state: { type: String, required: true },
  pincode: { type: String, required: true },
  country: { type: String, default: "India" },
  isDefault: { type: Boolean, default: false },
});

const UserSchema = new Schema<IUser>(
  {
    // identity assigned by the auth provider, e.g. "phone:+919800000000"
    externalId: { type: String, required: true, unique: true },
    phone: { type: String, index: true, sparse: true },
    email: { type: String, lowercase: true, trim: true },
    firstName: { type: String },
    lastName: { type: String },
    role: { type: String, enum: ["customer", "admin"], default: "customer" },
    addresses: { type: [AddressSchema], default: [] },
  },
  { timestamps: true, collection: "users" }
);

export default mongoose.model<IUser>("User", UserSchema);
