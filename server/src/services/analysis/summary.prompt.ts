import type { CategorizedPois } from '../pois/poi.types.js';
import { serializeCategorizedPois } from '../pois/poi.serialize.js';
import type { Message } from '../../llm/types.js';

export function buildSummaryMessages(area: string, city: string, pois: CategorizedPois): Message[] {
  const prompt = `Imagine you're a local resident giving a friendly, conversational tour of ${area}, ${city}.
Create an engaging summary that covers:

1. The neighborhood's vibe and lifestyle (based on the POIs)
2. What makes this area special for a 15-minute city concept
3. What daily life might look like here
4. Any unique features or interesting combinations of amenities

Use a conversational, first-person tone as if you're talking to a friend.
Include specific references to the POIs and their distribution:
${JSON.stringify(serializeCategorizedPois(pois), null, 2)}

Make it personal and relatable, mentioning real scenarios like:
- Morning coffee runs
- Weekend activities
- Daily conveniences
- Community spots

Keep it concise but engaging, around 3-4 sentences.

Provide a structured JSON response with the following keys:
- "summary": (in simple text, NOT in JSON) A concise summary of the living potential of the area, highlighting the strengths and weaknesses in each super-category.
- "ai_rating": A numerical rating from 0 to 100 representing how well this area functions as a "15-minute city" where residents can access most daily needs within a 15-minute walk or bike ride.

IMPORTANT: Only return the raw JSON, no additional text or explanations. The response must start with '{' and end with '}'.`;

  return [
    { role: 'system', content: 'You are a neighborhood livability analyst.' },
    { role: 'user', content: prompt }
  ];
}
