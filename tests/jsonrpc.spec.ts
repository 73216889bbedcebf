import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { formatToolText } from '@/mcp/envelope';
import { handleRpcMessage } from '@/mcp/jsonrpc';
import { fakeServices } from './helpers';

describe('handleRpcMessage', () => {
  it('answers initialize with the default protocol version', async () => {
    const response = await handleRpcMessage({ jsonrpc: '2.0', id: 1, method: 'initialize' }, fakeServices());
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: { listChanged: true }, resources: {}, prompts: {}, logging: {} },
        serverInfo: { name: 'travel-assistant', version: '1.0.0' },
      },
    });
  });

  it('echoes a supported protocol version and ignores unknown ones', async () => {
    const supported = await handleRpcMessage(
      { jsonrpc: '2.0', id: 'a', method: 'initialize', params: { protocolVersion: '2025-03-26' } },
      fakeServices(),
    );
    expect(supported).toMatchObject({ id: 'a', result: { protocolVersion: '2025-03-26' } });

    const unknown = await handleRpcMessage(
      { jsonrpc: '2.0', id: 'b', method: 'initialize', params: { protocolVersion: '1999-01-01' } },
      fakeServices(),
    );
    expect(unknown).toMatchObject({ id: 'b', result: { protocolVersion: '2024-11-05' } });
  });

  it('lists the six tools', async () => {
    const response = await handleRpcMessage({ jsonrpc: '2.0', id: 2, method: 'tools/list' }, fakeServices());
    expect(response).toMatchObject({ id: 2, result: { tools: expect.any(Array) } });
    const result = response && 'result' in response ? response.result : undefined;
    expect(result).toHaveProperty('tools.length', 6);
  });

  it('answers ping', async () => {
    expect(await handleRpcMessage({ jsonrpc: '2.0', id: 7, method: 'ping' }, fakeServices())).toEqual({
      jsonrpc: '2.0',
      id: 7,
      result: {},
    });
  });

  it('wraps a tool result as pretty-printed JSON text', async () => {
    const services = fakeServices();
    const payload = { location: 'Lisbon', results: [{ latitude: 38.72, longitude: -9.14, display_name: 'Lisboa' }] };
    services.geocoding.geocode.mockResolvedValue(payload);

    const response = await handleRpcMessage(
      { jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'geocode_location', arguments: { location: 'Lisbon' } } },
      services,
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }], isError: false },
    });
  });

  it('folds wrapper failures into an isError result', async () => {
    const services = fakeServices();
    services.finance.convertCurrency.mockRejectedValue(new Error('Exchange rate unavailable for USD-XYZ'));

    const response = await handleRpcMessage(
      {
        jsonrpc: '2.0',
        id: 4,
        method: 'tools/call',
        params: { name: 'convert_currency', arguments: { from_currency: 'USD', to_currency: 'XYZ' } },
      },
      services,
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 4,
      result: {
        content: [{ type: 'text', text: 'Error executing convert_currency: Exchange rate unavailable for USD-XYZ' }],
        isError: true,
      },
    });
  });

  it('reports argument errors inside the tool result', async () => {
    const response = await handleRpcMessage(
      { jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'search_flights', arguments: {} } },
      fakeServices(),
    );
    expect(response).toMatchObject({
      id: 5,
      result: {
        isError: true,
        content: [
          {
            type: 'text',
            text: 'Error executing search_flights: Invalid arguments: departure_id: Required; arrival_id: Required; outbound_date: Required',
          },
        ],
      },
    });
  });

  it('reports unknown tools as an isError result', async () => {
    const services = fakeServices();
    const response = await handleRpcMessage(
      { jsonrpc: '2.0', id: 6, method: 'tools/call', params: { name: 'book_flight', arguments: {} } },
      services,
    );
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 6,
      result: {
        content: [{ type: 'text', text: 'Error executing book_flight: Unknown tool: book_flight' }],
        isError: true,
      },
    });
    expect(services.flights.searchFlights).not.toHaveBeenCalled();
  });

  it('requires a tool name', async () => {
    const response = await handleRpcMessage({ jsonrpc: '2.0', id: 8, method: 'tools/call', params: {} }, fakeServices());
    expect(response).toEqual({ jsonrpc: '2.0', id: 8, error: { code: ErrorCode.InvalidParams, message: 'Missing tool name' } });
  });

  it('reports unknown methods', async () => {
    const response = await handleRpcMessage({ jsonrpc: '2.0', id: 9, method: 'resources/list' }, fakeServices());
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32601, message: 'Method not found: resources/list' },
    });
  });

  it('returns null for notifications', async () => {
    expect(await handleRpcMessage({ jsonrpc: '2.0', method: 'notifications/initialized' }, fakeServices())).toBeNull();
  });

  it('uses a null id when the request has none', async () => {
    expect(await handleRpcMessage({ jsonrpc: '2.0', method: 'ping' }, fakeServices())).toEqual({
      jsonrpc: '2.0',
      id: null,
      result: {},
    });
  });

  it('rejects messages that are not requests', async () => {
    expect(await handleRpcMessage({ id: 10, params: {} }, fakeServices())).toEqual({
      jsonrpc: '2.0',
      id: 10,
      error: { code: -32600, message: 'Invalid Request' },
    });
    expect(await handleRpcMessage('hello', fakeServices())).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Invalid Request' },
    });
  });
});

describe('formatToolText', () => {
  it('stringifies scalars and pretty-prints objects', () => {
    expect(formatToolText('done')).toBe('done');
    expect(formatToolText(42)).toBe('42');
    expect(formatToolText({ rate: 0.5 })).toBe('{\n  "rate": 0.5\n}');
  });
});
