import jwt from "jsonwebtoken";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimitedError, UnauthorizedError } from "../src/errors";
import { MemoryOtpRepository, MemoryUserRepository } from "../src/repositories/memory";
import { AuthOptions, AuthService, MAX_OTP_ATTEMPTS } from "../src/services/auth.service";
import { CapturingOtpSender } from "./helpers";

const PHONE = "+919812345678";
const options: AuthOptions = { jwtSecret: "test-secret", jwtTtlSeconds: 3600, otpTtlSeconds: 300, otpResendSeconds: 60 };

describe("AuthService", () => {
  let users: MemoryUserRepository;
  let sender: CapturingOtpSender;
  let auth: AuthService;

  beforeEach(() => {
    users = new MemoryUserRepository();
    sender = new CapturingOtpSender();
    auth = new AuthService(users, new MemoryOtpRepository(), sender, options, () => "123456");
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends a code and signs the user in with it", async () => {
    const { expiresAt } = await auth.requestOtp(PHONE);
    expect(sender.sent).toEqual([{ phone: PHONE, code: "123456" }]);
    expect(expiresAt.getTime()).toBeGreaterThan(Date.now());

    const { token, user } = await auth.verifyOtp(PHONE, "123456");
    expect(user).toMatchObject({ externalId: `phone:${PHONE}`, phone: PHONE, role: "customer" });

    const decoded = jwt.verify(token, "test-secret");
    expect(decoded).toMatchObject({ sub: user.id, role: "customer" });
    expect(await auth.authenticate(token)).toEqual({ id: user.id, role: "customer" });
  });

  it("finds the same user on the next sign-in", async () => {
    await auth.requestOtp(PHONE);
    const first = await auth.verifyOtp(PHONE, "123456");

    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(Date.now() + 61_000);
    await auth.requestOtp(PHONE);
    const second = await auth.verifyOtp(PHONE, "123456");

    expect(second.user.id).toBe(first.user.id);
  });

  it("does not accept a code twice", async () => {
    await auth.requestOtp(PHONE);
    await auth.verifyOtp(PHONE, "123456");
    await expect(auth.verifyOtp(PHONE, "123456")).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("rejects a wrong code and locks out after too many attempts", async () => {
    await auth.requestOtp(PHONE);
    for (let i = 0; i < MAX_OTP_ATTEMPTS; i++) {
      await expect(auth.verifyOtp(PHONE, "000000")).rejects.toThrow("Invalid or expired OTP");
    }
    await expect(auth.verifyOtp(PHONE, "123456")).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("rejects an expired code", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    await auth.requestOtp(PHONE);
    vi.setSystemTime(Date.now() + 301_000);

    await expect(auth.verifyOtp(PHONE, "123456")).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("throttles resends", async () => {
    await auth.requestOtp(PHONE);
    const err = await auth.requestOtp(PHONE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ status: 429 });
    expect(sender.sent).toHaveLength(1);
  });

  it("rejects tokens it did not sign or for users that are gone", async () => {
    await expect(auth.authenticate("not-a-token")).rejects.toThrow("Invalid token");
    await expect(auth.authenticate(jwt.sign({ role: "admin" }, "other-secret", { subject: "x" }))).rejects.toThrow(
      "Invalid token"
    );
    const ghost = auth.sign({ id: "64b0000000000000000000ee", role: "customer" });
    await expect(auth.authenticate(ghost)).rejects.toThrow("Unknown user");
  });

  it("reloads the role on every request", async () => {
    const admin = await users.findOrCreate("phone:+919800000009", { role: "admin" });
    const token = auth.sign({ id: admin.id, role: "customer" });
    expect((await auth.authenticate(token)).role).toBe("admin");
  });
});
