// src/services/auth.service.ts
import bcrypt from "bcryptjs";
import crypto from "crypto";
import dayjs from "dayjs";
import jwt, { JwtPayload } from "jsonwebtoken";
import { RateLimitedError, UnauthorizedError } from "../errors";
import type { OtpRepository, UserRepository } from "../repositories/types";
import type { User, UserRole } from "../types/domain";
import { logger } from "../utils/logger";

export const MAX_OTP_ATTEMPTS = 5;

export interface AuthUser {
  id: string;
  role: UserRole;
}

export interface OtpSender {
  send(phone: string, code: string): Promise<void>;
}

/** Writes codes to the log; SMS/WhatsApp delivery plugs in behind OtpSender. */
export class LogOtpSender implements OtpSender {
  constructor(private readonly revealCode: boolean) {}

  async send(phone: string, code: string): Promise<void> {
    logger.info("otp issued", {
      phone: `${"*".repeat(Math.max(phone.length - 4, 0))}${phone.slice(-4)}`,
      ...(this.revealCode ? { code } : {}),
    });
  }
}

export interface AuthOptions {
  jwtSecret: string;
  jwtTtlSeconds: number;
  otpTtlSeconds: number;
  otpResendSeconds: number;
}

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly otps: OtpRepository,
    private readonly sender: OtpSender,
    private readonly options: AuthOptions,
    private readonly generateCode: () => string = () => crypto.randomInt(100000, 1000000).toString()
  ) {}

  async requestOtp(phone: string): Promise<{ expiresAt: Date }> {
    const previous = await this.otps.findLatest(phone);
    if (previous) {
      const nextAllowed = dayjs(previous.createdAt).add(this.options.otpResendSeconds, "second");
      if (dayjs().isBefore(nextAllowed)) {
        throw new RateLimitedError(
          "Please wait before requesting another OTP",
          Math.ceil(nextAllowed.diff(dayjs(), "millisecond") / 1000)
        );
      }
    }

    const code = this.generateCode();
    const expiresAt = dayjs().add(this.options.otpTtlSeconds, "second").toDate();
    await this.otps.replace(phone, await bcrypt.hash(code, 8), expiresAt);
    await this.sender.send(phone, code);
    return { expiresAt };
  }

  async verifyOtp(phone: string, code: string): Promise<{ token: string; user: User }> {
    const otp = await this.otps.findLatest(phone);
    if (!otp || dayjs().isAfter(otp.expiresAt)) {
      throw new UnauthorizedError("Invalid or expired OTP");
    }
    if (otp.attempts >= MAX_OTP_ATTEMPTS) {
      await this.otps.delete(otp.id);
      throw new UnauthorizedError("Invalid or expired OTP");
    }
    if (!(await bcrypt.compare(code, otp.codeHash))) {
      await this.otps.incrementAttempts(otp.id);
      throw new UnauthorizedError("Invalid or expired OTP");
    }
    await this.otps.delete(otp.id);

    const user = await this.users.findOrCreate(`phone:${phone}`, { phone });
    logger.info("user signed in", { userId: user.id });
    return { token: this.sign(user), user };
  }

  sign(user: Pick<User, "id" | "role">): string {
    return jwt.sign({ role: user.role }, this.options.jwtSecret, {
      subject: user.id,
      expiresIn: this.options.jwtTtlSeconds,
      algorithm: "HS256",
    });
  }

  /** Verifies a bearer token and reloads the user so role changes apply at once. */
  async authenticate(token: string): Promise<AuthUser> {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.jwtSecret, { algorithms: ["HS256"] });
    } catch {
      throw new UnauthorizedError("Invalid token");
    }
    const subject = typeof payload === "string" ? undefined : payload.sub;
    if (!subject) throw new UnauthorizedError("Invalid token");

    const user = await this.users.findById(subject);
    if (!user) throw new UnauthorizedError("Unknown user");
    return { id: user.id, role: user.role };
  }

  async me(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) throw new UnauthorizedError("Unknown user");
    return user;
  }
}
