// Prompt text for the weather assistant and per-tool result guidance

export const SYSTEM_PROMPT =
  'You are a helpful weather assistant. Provide clear, concise weather information. ' +
  'Ask for clarification if location is unclear.';

export const DEGRADED_RESPONSE = 'I encountered an issue processing your request. Please try again.';

export const GENERIC_TOOL_GUIDANCE = 'Process the tool result and provide a helpful response to the user.';

export const CITY_TO_COORDS_GUIDANCE = `You have received geographic coordinates for a location.
Use these coordinates to fetch weather data if needed.
If the location was not found (error field present), politely ask the user to provide a more specific city name or verify the spelling.`;

export const CURRENT_WEATHER_GUIDANCE = `You have received current weather data for a location.
Present this information in a clear, conversational way:
- Lead with the current temperature and condition
- Mention feels-like temperature if significantly different
- Include wind speed and humidity when relevant
- Use appropriate units based on the data provided
- Keep the response concise but informative

If there's an error field, inform the user that weather data is temporarily unavailable and suggest trying again.`;

export const FORECAST_GUIDANCE = `You have received forecast entries in 3-hour steps for the requested timeframe.
Summarize the overall trend rather than listing every entry:
- Give the temperature range and the dominant conditions
- Call out precipitation when its probability is notable
- Mention strong wind if present

If the entries list is empty or there's an error field, tell the user the forecast is temporarily unavailable for that timeframe.`;
