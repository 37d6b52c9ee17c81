/**
 * Weather and web search capabilities
 */

import { Type } from '@sinclair/typebox';
import { NOTICES } from '../core/notices';
import { formatSearchResults, SearchService } from '../services/searchService';
import { formatWeather, WeatherService } from '../services/weatherService';
import { ToolRegistry } from './registry';

const WeatherParams = Type.Object({
  location: Type.Optional(Type.String({ description: 'City name; defaults to the configured location' }))
});

const SearchParams = Type.Object({
  query: Type.String({ description: 'What to search the web for' }),
  num_results: Type.Integer({ description: 'Number of results (1-10)', default: 3 })
});

export function registerWebTools(registry: ToolRegistry, weather?: WeatherService, search?: SearchService): void {
  registry.register('get_weather',
    async args => weather ? formatWeather(await weather.current(args.location)) : NOTICES.weatherUnavailable,
    WeatherParams,
    'Current weather conditions');

  registry.register('web_search',
    async args => {
      if (!search) return NOTICES.searchUnavailable;
      const count = Math.min(10, Math.max(1, args.num_results));
      return formatSearchResults(args.query, await search.search(args.query, count));
    },
    SearchParams,
    'Search the web for current information');
}
