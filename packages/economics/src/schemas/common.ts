/**
 * Shared wire primitives.
 * Amounts travel as decimal strings (uint256 does not fit a JSON number).
 */

import { Type, type Static } from "@sinclair/typebox";

export const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" });
export type AddressString = Static<typeof AddressString>;

export const Hash32String = Type.String({ pattern: "^0x[0-9a-f]{64}$" });

export const Uint256String = Type.String({ pattern: "^[0-9]{1,78}$" });
export type Uint256String = Static<typeof Uint256String>;

export const Bps = Type.Integer({ minimum: 0, maximum: 10_000 });

export const Seconds = Type.Integer({ minimum: 0 });

export const Memo = Type.String({ maxLength: 280 });
