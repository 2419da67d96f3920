// Bit-manipulation constants for BitSet words (32-bit integers)
export const BITS_PER_WORD_SHIFT = 5; // log2(32)
export const BITS_PER_WORD_MASK = 31; // 32 - 1
export const INITIAL_BITSET_WORDS = 4; // 128 bits before first grow

// FNV-1a hash constants (used by BitSet)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// Hash multipliers for combining family mask hashes (golden-ratio derived)
export const HASH_GOLDEN_RATIO = 0x9e3779b9;
export const HASH_SECONDARY_PRIME = 0x517cc1b7;

// First bit handed out by a ComponentRegistry; bit 0 is never assigned
export const FIRST_COMPONENT_BIT = 1;

// First index handed out by a FamilyRegistry
export const FIRST_FAMILY_INDEX = 0;

// First id handed out by Engine.create_entity
export const FIRST_ENTITY_ID = 0;
