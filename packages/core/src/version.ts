export const ENGINE_VERSION = '1.0.0';

// Bump whenever FUZZ_STRONG / FUZZ_POSSIBLE or a matching policy changes
export const MATCH_THRESHOLD_VERSION = '2024.1-strong95-possible90';
