/**
 * UID is a globally unique identifier for catalog and audit entities.
 * Example: "3f1c9a52-8d0e-4f7a-9b8e-2c6d1e0a7b44"
 */
export type UID = string; // unique identifier for entities
