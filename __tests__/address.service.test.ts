import { beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "../src/errors";
import { MemoryUserRepository } from "../src/repositories/memory";
import { AddressService, NewAddress } from "../src/services/address.service";

const home: NewAddress = { line1: "1 Camellia St", city: "Darjeeling", state: "WB", pincode: "734101" };
const office: NewAddress = { line1: "9 Leaf Park", city: "Kolkata", state: "WB", pincode: "700001" };

describe("AddressService", () => {
  let users: MemoryUserRepository;
  let addresses: AddressService;
  let userId: string;

  beforeEach(async () => {
    users = new MemoryUserRepository();
    addresses = new AddressService(users);
    userId = (await users.findOrCreate("phone:+919811111111", { phone: "+919811111111" })).id;
  });

  const defaults = async () => (await addresses.list(userId)).filter((a) => a.isDefault).map((a) => a.line1);

  it("makes the first address the default and fills the country", async () => {
    const a = await addresses.add(userId, home);
    expect(a).toMatchObject({ ...home, country: "India", isDefault: true });
    expect(a.id).toMatch(/^[0-9a-f]{24}$/);
  });

  it("keeps exactly one default", async () => {
    await addresses.add(userId, home);
    const second = await addresses.add(userId, { ...office, isDefault: true });
    expect(await defaults()).toEqual(["9 Leaf Park"]);

    await addresses.remove(userId, second.id);
    expect(await defaults()).toEqual(["1 Camellia St"]);
  });

  it("switches the default", async () => {
    await addresses.add(userId, home);
    const second = await addresses.add(userId, office);
    expect(await defaults()).toEqual(["1 Camellia St"]);

    await addresses.setDefault(userId, second.id);
    expect(await defaults()).toEqual(["9 Leaf Park"]);
  });

  it("updates fields in place", async () => {
    const a = await addresses.add(userId, home);
    const updated = await addresses.update(userId, a.id, { line2: "Flat 3", pincode: "734102" });
    expect(updated).toMatchObject({ id: a.id, line1: "1 Camellia St", line2: "Flat 3", pincode: "734102", isDefault: true });
  });

  it("reports unknown addresses and users", async () => {
    await expect(addresses.setDefault(userId, "64b0000000000000000000aa")).rejects.toThrow(
      "Address 64b0000000000000000000aa not found"
    );
    await expect(addresses.list("64b0000000000000000000bb")).rejects.toBeInstanceOf(NotFoundError);
  });
});
