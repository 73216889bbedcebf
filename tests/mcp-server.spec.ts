import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { buildMcpServer } from '@/mcp/server';
import { fakeServices, type FakeServices } from './helpers';

describe('MCP SDK server', () => {
  let services: FakeServices;
  let client: Client;

  beforeEach(async () => {
    services = fakeServices();
    const server = buildMcpServer(services);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('reports the server identity', () => {
    expect(client.getServerVersion()).toMatchObject({ name: 'travel-assistant', version: '1.0.0' });
  });

  it('lists the six tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      'search_flights',
      'search_hotels',
      'get_current_weather',
      'search_events',
      'convert_currency',
      'geocode_location',
    ]);
    expect(tools[0].inputSchema.required).toEqual(['departure_id', 'arrival_id', 'outbound_date']);
  });

  it('calls a tool through the shared dispatcher', async () => {
    services.weather.getCurrentWeather.mockResolvedValue({ current: { temperature: 21 } });

    const result = await client.callTool({ name: 'get_current_weather', arguments: { location: 'Madrid' } });

    expect(result).toEqual({
      content: [{ type: 'text', text: JSON.stringify({ current: { temperature: 21 } }, null, 2) }],
      isError: false,
    });
    expect(services.weather.getCurrentWeather).toHaveBeenCalledWith({ location: 'Madrid', units: 'm' });
  });

  it('returns wrapper failures as error results', async () => {
    services.hotels.searchHotels.mockRejectedValue(new Error('Missing SERPAPI_KEY'));

    const result = await client.callTool({
      name: 'search_hotels',
      arguments: { location: 'Rome', check_in_date: '2025-04-01', check_out_date: '2025-04-03' },
    });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing search_hotels: Missing SERPAPI_KEY' }],
      isError: true,
    });
  });

  it('rejects unexpected arguments the same way as /sse', async () => {
    const result = await client.callTool({
      name: 'convert_currency',
      arguments: { from_currency: 'USD', to_currency: 'EUR', rate: 2 },
    });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing convert_currency: Invalid arguments: rate: Unexpected argument' }],
      isError: true,
    });
    expect(services.finance.convertCurrency).not.toHaveBeenCalled();
  });

  it('names missing arguments the same way as /sse', async () => {
    const result = await client.callTool({ name: 'geocode_location', arguments: {} });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing geocode_location: Invalid arguments: location: Required' }],
      isError: true,
    });
  });

  it('reports unknown tools as error results', async () => {
    const result = await client.callTool({ name: 'book_flight', arguments: {} });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing book_flight: Unknown tool: book_flight' }],
      isError: true,
    });
  });
});
