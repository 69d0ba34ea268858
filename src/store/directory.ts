// ---------------------------------------------------------------------------
// Users and addresses read model (owned by the account modules)
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { storeCall, type Db } from './database.js';

const UserRow = z.object({
  id: z.number(),
  name: z.string(),
  email: z.string(),
  role: z.enum(['admin', 'customer']),
  status: z.enum(['active', 'blocked']),
});

export type UserRecord = z.infer<typeof UserRow>;
export type UserRole = UserRecord['role'];
export type UserStatus = UserRecord['status'];

export interface AddressRecord {
  id: number;
  userId: number;
  fullAddress: string;
  city: string | null;
  state: string | null;
  pincode: string | null;
  country: string | null;
  isDefault: boolean;
}

const AddressRow = z.object({
  id: z.number(),
  user_id: z.number(),
  full_address: z.string(),
  city: z.string().nullable(),
  state: z.string().nullable(),
  pincode: z.string().nullable(),
  country: z.string().nullable(),
  is_default: z.number(),
});

export class DirectoryRepository {
  constructor(private readonly db: Db) {}

  findUser(id: number): UserRecord | undefined {
    return storeCall(() => this.db.get(UserRow, 'SELECT id, name, email, role, status FROM users WHERE id = ?', [id]));
  }

  findAddress(id: number): AddressRecord | undefined {
    const row = storeCall(() =>
      this.db.get(
        AddressRow,
        `SELECT id, user_id, full_address, city, state, pincode, country, is_default
         FROM addresses WHERE id = ?`,
        [id],
      ),
    );
    if (!row) return undefined;

    return {
      id: row.id,
      userId: row.user_id,
      fullAddress: row.full_address,
      city: row.city,
      state: row.state,
      pincode: row.pincode,
      country: row.country,
      isDefault: row.is_default === 1,
    };
  }
}
