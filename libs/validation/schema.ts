import { z } from 'zod';
import { isValidIdentity } from '../combo/address.js';

/**
 * Central schema definitions for registry inputs.
 *
 * These check shape and wire widths only. Domain ranges (damage 1-1000,
 * at most 20 verification moves, ...) belong to the combo guards, which
 * report them with their own error kinds.
 */

const u8 = z.number().int().min(0).max(0xff);
const u32 = z.number().int().min(0).max(0xffffffff);

// --- Identity Schemas ---

export const IdentitySchema = z.string().refine(isValidIdentity, {
    message: 'Expected a base58-encoded 32-byte public key'
});

// --- Instruction Schemas ---

export const CreateComboRequestSchema = z.object({
    name: z.string().max(1024),
    damage: u32,
    meterGain: u32,
    moveCount: u8,
    characterId: u8
}).strict();

export const VerifyComboRequestSchema = z.object({
    moves: z.array(u8).max(1024)
}).strict();

export const CloseComboRequestSchema = z.object({
    destination: IdentitySchema
}).strict();
