export function buildSafetyAnalysisPrompt(): string {
  return `Analyze this image from a garbage truck's point of view.
Identify obvious and clear safety issues related to collecting trash from trash cans visible in the frame.

Examples of safety issues to look for:
- Fire or smoke coming from trash cans
- Fire or smoke coming from the garbage truck itself or its collector crane
- Hazardous materials visible (chemical containers, batteries, etc.)
- Dangerous and sharp objects protruding from trash cans
- People or animals too close to the collection area
- Weather-related hazards (ice, flooding, etc.)

Vehicles near the collection area are not safety issues unless they are extremely close.

For each issue give:
- "issue_type": a short category such as "fire", "hazardous_material", "sharp_object", "person_too_close", "animal_too_close" or "weather"
- "location": where in the frame the issue is (e.g. "left curb, next to the blue bin")
- "description": one or two sentences describing what is visible

If no safety issues are detected, return an empty "safety_issues" array.`;
}

/** Structured-output schema sent as `response_format`. */
export const SAFETY_ANALYSIS_RESPONSE_FORMAT = {
  type: 'json_schema',
  json_schema: {
    name: 'safety_analysis',
    strict: true,
    schema: {
      type: 'object',
      properties: {
        safety_issues: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              issue_type: { type: 'string' },
              location: { type: 'string' },
              description: { type: 'string' },
            },
            required: ['issue_type', 'location', 'description'],
            additionalProperties: false,
          },
        },
      },
      required: ['safety_issues'],
      additionalProperties: false,
    },
  },
} satisfies Record<string, unknown>;
