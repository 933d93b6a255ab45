// src/services/address.service.ts
import { Types } from "mongoose";
import { NotFoundError } from "../errors";
import type { UserRepository } from "../repositories/types";
import type { Address, AddressInput, User } from "../types/domain";

export type NewAddress = Omit<AddressInput, "country" | "isDefault"> & {
  country?: string;
  isDefault?: boolean;
};

/** Exactly one address is the default whenever the user has any. */
function normalizeDefault(addresses: Address[], preferredId?: string): Address[] {
  if (addresses.length === 0) return addresses;
  const defaultId =
    preferredId ?? addresses.find((a) => a.isDefault)?.id ?? addresses[0].id;
  return addresses.map((a) => ({ ...a, isDefault: a.id === defaultId }));
}

export class AddressService {
  constructor(private readonly users: UserRepository) {}

  async list(userId: string): Promise<Address[]> {
    return (await this.user(userId)).addresses;
  }

  async add(userId: string, input: NewAddress): Promise<Address> {
    const user = await this.user(userId);
    const address: Address = {
      ...input,
      id: new Types.ObjectId().toHexString(),
      country: input.country ?? "India",
      isDefault: input.isDefault ?? false,
    };
    const next = normalizeDefault([...user.addresses, address], address.isDefault ? address.id : undefined);
    await this.save(userId, next);
    return this.pick(next, address.id);
  }

  async update(userId: string, addressId: string, patch: Partial<NewAddress>): Promise<Address> {
    const user = await this.user(userId);
    this.pick(user.addresses, addressId);

    const next = user.addresses.map((a) => {
      if (a.id !== addressId) return a;
      const merged: Address = { ...a };
      for (const [key, value] of Object.entries(patch)) {
        if (value !== undefined) Object.assign(merged, { [key]: value });
      }
      return merged;
    });
    const preferred = patch.isDefault ? addressId : undefined;
    const saved = normalizeDefault(
      // un-defaulting the current default hands the flag to the first address
      patch.isDefault === false ? next.map((a) => ({ ...a, isDefault: false })) : next,
      preferred
    );
    await this.save(userId, saved);
    return this.pick(saved, addressId);
  }

  async remove(userId: string, addressId: string): Promise<void> {
    const user = await this.user(userId);
    this.pick(user.addresses, addressId);
    await this.save(userId, normalizeDefault(user.addresses.filter((a) => a.id !== addressId)));
  }

  async setDefault(userId: string, addressId: string): Promise<Address> {
    const user = await this.user(userId);
    this.pick(user.addresses, addressId);
    const next = normalizeDefault(user.addresses, addressId);
    await this.save(userId, next);
    return this.pick(next, addressId);
  }

  private async user(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError("User", userId);
    return user;
  }

  private async save(userId: string, addresses: Address[]): Promise<void> {
    const saved = await this.users.setAddresses(userId, addresses);
    if (!saved) throw new NotFoundError("User", userId);
  }

  private pick(addresses: Address[], addressId: string): Address {
    const found = addresses.find((a) => a.id === addressId);
    if (!found) throw new NotFoundError("Address", addressId);
    return found;
  }
}
