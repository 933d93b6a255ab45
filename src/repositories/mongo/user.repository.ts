// src/repositories/mongo/user.repository.ts
import { Types } from "mongoose";
import UserModel, { IUser } from "../../models/User";
import { withRetry } from "../../utils/retry";
import type { Address, User, UserRole } from "../../types/domain";
import type { UserRepository } from "../types";
import { isDuplicateKey } from "./isDuplicateKey";

function toUser(doc: IUser): User {
  return {
    id: doc._id.toString(),
    externalId: doc.externalId,
    phone: doc.phone ?? undefined,
    email: doc.email ?? undefined,
    firstName: doc.firstName ?? undefined,
    lastName: doc.lastName ?? undefined,
    role: doc.role,
    addresses: (doc.addresses ?? []).map((a) => ({
      id: a._id.toString(),
      line1: a.line1,
      line2: a.line2 ?? undefined,
      city: a.city,
      state: a.state,
      pincode: a.pincode,
      country: a.country,
      isDefault: a.isDefault,
    })),
    createdAt: doc.createdAt,
  };
}

const isId = (id: string) => Types.ObjectId.isValid(id) && /^[0-9a-f]{24}$/i.test(id);

export class MongoUserRepository implements UserRepository {
  async findById(id: string): Promise<User | null> {
    if (!isId(id)) return null;
    const doc = await withRetry("users.findById", () => UserModel.findById(id).lean<IUser>().exec());
    return doc ? toUser(doc) : null;
  }

  async findByExternalId(externalId: string): Promise<User | null> {
    const doc = await withRetry("users.findByExternalId", () =>
      UserModel.findOne({ externalId }).lean<IUser>().exec()
    );
    return doc ? toUser(doc) : null;
  }

  async findOrCreate(externalId: string, defaults: { phone?: string; role?: UserRole }): Promise<User> {
    try {
      const doc = await withRetry("users.findOrCreate", () =>
        UserModel.findOneAndUpdate(
          { externalId },
          { $setOnInsert: { externalId, phone: defaults.phone, role: defaults.role ?? "customer" } },
          { new: true, upsert: true }
        )
          .lean<IUser>()
          .exec()
      );
      if (doc) return toUser(doc);
    } catch (err) {
      // two first logins racing on the unique externalId
      if (!isDuplicateKey(err)) throw err;
    }
    const existing = await this.findByExternalId(externalId);
    if (!existing) throw new Error(`User ${externalId} vanished during upsert`);
    return existing;
  }

  async setAddresses(userId: string, addresses: Address[]): Promise<User | null> {
    if (!isId(userId)) return null;
    const docs = addresses.map(({ id, ...rest }) => ({ _id: new Types.ObjectId(id), ...rest }));
    const doc = await withRetry("users.setAddresses", () =>
      UserModel.findByIdAndUpdate(userId, { $set: { addresses: docs } }, { new: true, runValidators: true })
        .lean<IUser>()
        .exec()
    );
    return doc ? toUser(doc) : null;
  }
}
