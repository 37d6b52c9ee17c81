import { describe, expect, it } from 'vitest';
import { stripMentions } from '../src/slack/bot';

describe('stripMentions', () => {
  it('removes user mention tokens', () => {
    expect(stripMentions('<@U123ABC> what is on today?')).toBe('what is on today?');
    expect(stripMentions('hey <@U123ABC|concierge> !upcoming 3')).toBe('hey  !upcoming 3');
  });
});
