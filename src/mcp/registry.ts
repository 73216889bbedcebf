/**
 * Static tool descriptors advertised on tools/list. The input schemas are advisory:
 * nothing checks arguments against them before dispatch.
 */

export const TOOL_NAMES = [
  'search_flights',
  'search_hotels',
  'get_current_weather',
  'search_events',
  'convert_currency',
  'geocode_location',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

// Type aliases so descriptors stay assignable to the SDK's Tool type.
export type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  default?: string | number | boolean;
  enum?: readonly string[];
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

export type ToolDescriptor = {
  name: ToolName;
  description: string;
  inputSchema: ToolInputSchema;
};

const TOOLS: readonly ToolDescriptor[] = [
  {
    name: 'search_flights',
    description: 'Search for flights between airports',
    inputSchema: {
      type: 'object',
      properties: {
        departure_id: { type: 'string', description: 'Departure airport code' },
        arrival_id: { type: 'string', description: 'Arrival airport code' },
        outbound_date: { type: 'string', description: 'Departure date YYYY-MM-DD' },
        return_date: { type: 'string', description: 'Return date YYYY-MM-DD (optional)' },
        adults: { type: 'integer', default: 1 },
        children: { type: 'integer', default: 0 },
        travel_class: {
          type: 'integer',
          description: '1 economy, 2 premium economy, 3 business, 4 first',
          default: 1,
        },
        currency: { type: 'string', default: 'USD' },
        max_results: { type: 'integer', default: 10 },
      },
      required: ['departure_id', 'arrival_id', 'outbound_date'],
    },
  },
  {
    name: 'search_hotels',
    description: 'Search for hotels in a location',
    inputSchema: {
      type: 'object',
      properties: {
        location: { type: 'string', description: 'Location to search hotels' },
        check_in_date: { type: 'string', description: 'Check-in date YYYY-MM-DD' },
        check_out_date: { type: 'string', description: 'Check-out date YYYY-MM-DD' },
        adults: { type: 'integer', default: 2 },
        children: { type: 'integer', default: 0 },
        currency: { type: 'string', default: 'USD' },
        max_results: { type: 'integer', default: 10 },
      },
      required: ['location', 'check_in_date', 'check_out_date'],
    },
  },
  {
    name: 'get_current_weather',
    description: 'Get current weather for a location',
    inputSchema: {
      type: 'object',
      properties: {
        location: { type: 'string', description: 'Location name or coordinates' },
        units: {
          type: 'string',
          description: 'm = metric, f = fahrenheit, s = scientific',
          enum: ['m', 'f', 's'],
          default: 'm',
        },
      },
      required: ['location'],
    },
  },
  {
    name: 'search_events',
    description: 'Search for events',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Event search query' },
        location: { type: 'string', description: 'Location to search (optional)' },
        date_range_start: { type: 'string', description: 'Earliest date YYYY-MM-DD (optional)' },
        date_range_end: { type: 'string', description: 'Latest date YYYY-MM-DD (optional)' },
        category: { type: 'string', description: 'Event category, e.g. concerts (optional)' },
        max_results: { type: 'integer', default: 10 },
      },
      required: ['query'],
    },
  },
  {
    name: 'convert_currency',
    description: 'Convert currency amounts',
    inputSchema: {
      type: 'object',
      properties: {
        from_currency: { type: 'string', description: 'Source currency code' },
        to_currency: { type: 'string', description: 'Target currency code' },
        amount: { type: 'number', default: 1.0 },
      },
      required: ['from_currency', 'to_currency'],
    },
  },
  {
    name: 'geocode_location',
    description: 'Get coordinates for a location',
    inputSchema: {
      type: 'object',
      properties: {
        location: { type: 'string', description: 'Location to geocode' },
        max_results: { type: 'integer', default: 1 },
      },
      required: ['location'],
    },
  },
];

export function listTools(): readonly ToolDescriptor[] {
  return TOOLS;
}

export function isToolName(name: unknown): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}
