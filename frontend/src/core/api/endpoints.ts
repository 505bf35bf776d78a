// Relay server routes, relative to BACKEND_BASE_URL.
export const endpoints = {
  generate: "/generate",
  models: "/api/models"
} as const;
