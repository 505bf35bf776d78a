import type { ToolDefinition } from "../together/types";

const locationParams = (example: string, extra: Record<string, unknown>) => ({
  type: "object",
  properties: {
    location: { type: "string", description: example },
    ...extra,
  },
  required: ["location"],
});

const unitParam = {
  unit: {
    type: "string",
    enum: ["celsius", "fahrenheit"],
    description: "Temperature unit; infer it from the user's location.",
  },
};

const formatParam = {
  format: {
    type: "string",
    enum: ["12h", "24h"],
    description: "12-hour or 24-hour clock.",
  },
};

function tool(name: string, description: string, parameters: Record<string, unknown>): ToolDefinition {
  return { type: "function", function: { name, description, parameters } };
}

/** Offered to tool-capable models on every request. */
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  tool(
    "get_real_weather",
    "Current weather for a city from OpenWeatherMap: conditions, temperature, humidity, wind and more.",
    locationParams("City name, e.g. London, Tokyo, New York", unitParam)
  ),
  tool(
    "get_real_time",
    "Current local time for a place from TimeZoneDB, with timezone details.",
    locationParams("Place to get the time for, e.g. 'New York' or 'Tokyo'", formatParam)
  ),
  tool(
    "get_weather",
    "Simulated weather data; only use when real-time data is unavailable.",
    locationParams("City and state, e.g. San Francisco, CA", unitParam)
  ),
  tool(
    "get_current_time",
    "Simulated local time; only use when real-time data is unavailable.",
    locationParams("Place to get the time for, e.g. 'New York' or 'Tokyo'", formatParam)
  ),
  tool("search_products", "Search the product catalogue.", {
    type: "object",
    properties: {
      query: { type: "string", description: "Words to look for in product names" },
      category: { type: "string", description: "Category to filter by" },
      max_price: { type: "number", description: "Highest price to include" },
      sort_by: {
        type: "string",
        enum: ["price_asc", "price_desc", "popularity", "rating"],
        description: "Result order",
      },
    },
    required: ["query"],
  }),
  tool("search_wikipedia", "Look a topic up on Wikipedia.", {
    type: "object",
    properties: {
      query: { type: "string", description: "Topic or search terms" },
      limit: { type: "integer", description: "How many articles to return (1-5)", default: 1 },
    },
    required: ["query"],
  }),
];
