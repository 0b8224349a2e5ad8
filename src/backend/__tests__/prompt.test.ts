import { describe, it, expect } from 'vitest';
import { renderPrompt, renderToolCall, renderToolPreamble } from '../prompt.js';
import type { Tool } from '../../shared/types.js';

const WEATHER_TOOL: Tool = {
  type: 'function',
  function: {
    name: 'get_weather',
    description: 'Look up the weather',
    parameters: { type: 'object', properties: { city: { type: 'string' } } },
  },
};

describe('renderPrompt', () => {
  it('renders plain messages as role-prefixed sections', () => {
    const prompt = renderPrompt([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hi' },
    ]);

    expect(prompt).toBe('system: Be brief.\n\nuser: Hi');
  });

  it('puts the tool preamble first when tools are offered', () => {
    const prompt = renderPrompt([{ role: 'user', content: 'Weather in Oslo?' }], [WEATHER_TOOL]);

    expect(prompt).toBe(`${renderToolPreamble([WEATHER_TOOL])}\n\nuser: Weather in Oslo?`);
  });

  it('renders assistant tool calls and tool results', () => {
    const prompt = renderPrompt([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call-1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Oslo"}' } },
        ],
      },
      { role: 'tool', content: 'rainy', name: 'get_weather', tool_call_id: 'call-1' },
      { role: 'tool', content: 'unnamed result' },
    ]);

    expect(prompt).toBe(
      [
        'assistant:\n<tool_call>{"name":"get_weather","arguments":{"city":"Oslo"}}</tool_call>',
        'tool:get_weather[call-1]: rainy',
        'tool: unnamed result',
      ].join('\n\n'),
    );
  });

  it('keeps assistant text ahead of its calls', () => {
    expect(renderPrompt([{ role: 'assistant', content: 'Checking.' }])).toBe('assistant: Checking.');
  });
});

describe('renderToolPreamble', () => {
  it('lists each tool function as one JSON line', () => {
    const lines = renderToolPreamble([WEATHER_TOOL]).split('\n');

    expect(lines[0]).toBe('You can call the following tools:');
    expect(lines[1]).toBe('<tools>');
    expect(lines[2]).toBe(JSON.stringify(WEATHER_TOOL.function));
    expect(lines[3]).toBe('</tools>');
    expect(lines[5]).toBe('<tool_call>{"name": "<tool name>", "arguments": {<arguments object>}}</tool_call>');
  });
});

describe('renderToolCall', () => {
  it('keeps arguments that are not valid JSON as a string', () => {
    const rendered = renderToolCall({
      id: 'call-2',
      type: 'function',
      function: { name: 'echo', arguments: 'not json' },
    });

    expect(rendered).toBe('<tool_call>{"name":"echo","arguments":"not json"}</tool_call>');
  });
});
