// Utility types for the photo renamer

// Generic result type for operations that can succeed or fail
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };
