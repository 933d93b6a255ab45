// src/repositories/mongo/otp.repository.ts
import OtpModel, { IOtp } from "../../models/Otp";
import { withRetry } from "../../utils/retry";
import type { OtpRecord } from "../../types/domain";
import type { OtpRepository } from "../types";

function toOtp(doc: IOtp): OtpRecord {
  return {
    id: doc._id.toString(),
    phone: doc.phone,
    codeHash: doc.codeHash,
    attempts: doc.attempts,
    expiresAt: doc.expiresAt,
    createdAt: doc.createdAt,
  };
}

export class MongoOtpRepository implements OtpRepository {
  async findLatest(phone: string): Promise<OtpRecord | null> {
    const doc = await withRetry("otps.findLatest", () =>
      OtpModel.findOne({ phone }).sort({ createdAt: -1 }).lean<IOtp>().exec()
    );
    return doc ? toOtp(doc) : null;
  }

  async replace(phone: string, codeHash: string, expiresAt: Date): Promise<OtpRecord> {
    await withRetry("otps.deleteMany", () => OtpModel.deleteMany({ phone }).exec());
    const doc = await withRetry("otps.create", () => OtpModel.create({ phone, codeHash, expiresAt }), {
      idempotent: false,
    });
    return toOtp(doc.toObject());
  }

  async incrementAttempts(id: string): Promise<void> {
    await withRetry(
      "otps.incrementAttempts",
      () => OtpModel.updateOne({ _id: id }, { $inc: { attempts: 1 } }).exec(),
      { idempotent: false }
    );
  }

  async delete(id: string): Promise<void> {
    await withRetry("otps.delete", () => OtpModel.deleteOne({ _id: id }).exec());
  }
}
