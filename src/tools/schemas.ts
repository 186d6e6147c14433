import { z } from 'zod';

const SELECTOR_HINT =
  'Provide at least one of resource_id, text, content_description or class_name.';

const selectorFields = {
  resource_id: z
    .string()
    .optional()
    .describe("Element resource-id, e.g. 'com.example.app:id/button' or just 'button'"),
  text: z.string().optional().describe('Text contained in the element (case-insensitive)'),
  content_description: z.string().optional().describe('Exact content description'),
  class_name: z.string().optional().describe("Exact class name, e.g. 'android.widget.Button'"),
};

export type SelectorInput = {
  resource_id?: string;
  text?: string;
  content_description?: string;
  class_name?: string;
};

function hasSelector(value: SelectorInput): boolean {
  return Boolean(value.resource_id || value.text || value.content_description || value.class_name);
}

export const TapInputSchema = z.object({
  x: z.number().int().describe('Tap X coordinate in pixels.'),
  y: z.number().int().describe('Tap Y coordinate in pixels.'),
});

export const LongPressInputSchema = TapInputSchema.extend({
  duration: z.number().int().min(1).optional().describe('Press duration in milliseconds.'),
});

export const SwipeInputSchema = z.object({
  startX: z.number().int().describe('Start X coordinate in pixels.'),
  startY: z.number().int().describe('Start Y coordinate in pixels.'),
  endX: z.number().int().describe('End X coordinate in pixels.'),
  endY: z.number().int().describe('End Y coordinate in pixels.'),
  duration: z.number().int().optional().describe('Swipe duration in milliseconds (10-5000).'),
});

export const InputTextInputSchema = z.object({
  text: z.string().describe('Text to type into the focused field.'),
  clear: z.boolean().default(true).describe('Replace the current content instead of appending.'),
});

export const EmptyInputSchema = z.object({});

export const KeyInputSchema = z.object({
  key_code: z.number().int().min(0).describe('Android key code, e.g. 4 for BACK, 66 for ENTER.'),
});

export const LaunchAppInputSchema = z.object({
  package: z.string().min(1).describe("Package name, e.g. 'com.android.settings'."),
  activity: z.string().optional().describe('Optional activity, absolute or starting with "."'),
});

export const GlobalActionInputSchema = z.object({
  action: z
    .enum(['back', 'home', 'recents', 'notifications', 'quick_settings', 'power_dialog'])
    .describe('System action to perform.'),
});

export const ScreenshotInputSchema = z.object({
  hideOverlay: z.boolean().default(true).describe('Hide the element overlay while capturing.'),
});

export const ScreenDumpInputSchema = z.object({
  filter: z.boolean().default(true).describe('Only include elements visible on screen.'),
});

export const PackagesInputSchema = z.object({
  filter: z.enum(['user', 'system', 'all']).default('all').describe('Which packages to list.'),
});

export const WaitForInputSchema = z
  .object({
    text: z.string().optional().describe('Wait for an element containing this text.'),
    resource_id: z.string().optional().describe('Wait for an element with this resource-id.'),
    content_description: z.string().optional().describe('Wait for this content description.'),
    gone: z.boolean().default(false).describe('Wait for the element to disappear instead.'),
    timeout_ms: z.number().int().positive().optional().describe('Maximum wait.'),
    interval_ms: z.number().int().positive().optional().describe('Polling interval.'),
  })
  .refine(value => Boolean(value.text || value.resource_id || value.content_description), {
    message: 'Provide at least one of text, resource_id or content_description.',
  });

export const ElementInputSchema = z.object(selectorFields).refine(hasSelector, {
  message: SELECTOR_HINT,
});

export const ElementLongPressInputSchema = z
  .object({
    ...selectorFields,
    duration: z.number().int().min(1).optional().describe('Press duration in milliseconds.'),
  })
  .refine(hasSelector, { message: SELECTOR_HINT });

export const ElementScrollInputSchema = z
  .object({
    ...selectorFields,
    direction: z
      .enum(['forward', 'backward', 'up', 'down', 'left', 'right'])
      .default('forward')
      .describe("'forward' scrolls down, 'backward' scrolls up."),
  })
  .refine(hasSelector, { message: SELECTOR_HINT });

export const ElementSetTextInputSchema = z
  .object({
    ...selectorFields,
    new_text: z.string().describe('Text to enter into the element.'),
    clear: z.boolean().default(true).describe('Replace the current content instead of appending.'),
  })
  .refine(hasSelector, { message: SELECTOR_HINT });

export const ElementDragInputSchema = z
  .object({
    ...selectorFields,
    target_x: z.number().int().describe('Drop X coordinate in pixels.'),
    target_y: z.number().int().describe('Drop Y coordinate in pixels.'),
  })
  .refine(hasSelector, { message: SELECTOR_HINT });

export const ElementToggleInputSchema = z
  .object({
    ...selectorFields,
    checked: z.boolean().optional().describe('Desired state. Omit to flip the current state.'),
  })
  .refine(hasSelector, { message: SELECTOR_HINT });

// JSON schemas advertised through tools/list

const coordinate = (description: string) => ({ type: 'number' as const, description });

const selectorProperties = {
  resource_id: {
    type: 'string' as const,
    description: "Element resource-id, e.g. 'com.example.app:id/button' or just 'button'.",
  },
  text: { type: 'string' as const, description: 'Text contained in the element.' },
  content_description: { type: 'string' as const, description: 'Exact content description.' },
  class_name: { type: 'string' as const, description: 'Exact class name.' },
};

export const TapToolSchema = {
  type: 'object' as const,
  properties: {
    x: coordinate('Tap X coordinate in pixels.'),
    y: coordinate('Tap Y coordinate in pixels.'),
  },
  required: ['x', 'y'],
};

export const LongPressToolSchema = {
  type: 'object' as const,
  properties: {
    ...TapToolSchema.properties,
    duration: { type: 'number' as const, description: 'Press duration in milliseconds.' },
  },
  required: ['x', 'y'],
};

export const SwipeToolSchema = {
  type: 'object' as const,
  properties: {
    startX: coordinate('Start X coordinate in pixels.'),
    startY: coordinate('Start Y coordinate in pixels.'),
    endX: coordinate('End X coordinate in pixels.'),
    endY: coordinate('End Y coordinate in pixels.'),
    duration: { type: 'number' as const, description: 'Swipe duration in milliseconds.' },
  },
  required: ['startX', 'startY', 'endX', 'endY'],
};

export const InputTextToolSchema = {
  type: 'object' as const,
  properties: {
    text: { type: 'string' as const, description: 'Text to type into the focused field.' },
    clear: {
      type: 'boolean' as const,
      description: 'Replace the current content instead of appending (default true).',
    },
  },
  required: ['text'],
};

export const EmptyToolSchema = {
  type: 'object' as const,
  properties: {},
};

export const KeyToolSchema = {
  type: 'object' as const,
  properties: {
    key_code: { type: 'number' as const, description: 'Android key code (4 = BACK, 66 = ENTER).' },
  },
  required: ['key_code'],
};

export const LaunchAppToolSchema = {
  type: 'object' as const,
  properties: {
    package: { type: 'string' as const, description: 'Package name to launch.' },
    activity: { type: 'string' as const, description: 'Optional activity to start.' },
  },
  required: ['package'],
};

export const GlobalActionToolSchema = {
  type: 'object' as const,
  properties: {
    action: {
      type: 'string' as const,
      enum: ['back', 'home', 'recents', 'notifications', 'quick_settings', 'power_dialog'],
      description: 'System action to perform.',
    },
  },
  required: ['action'],
};

export const ScreenshotToolSchema = {
  type: 'object' as const,
  properties: {
    hideOverlay: {
      type: 'boolean' as const,
      description: 'Hide the element overlay while capturing (default true).',
    },
  },
};

export const ScreenDumpToolSchema = {
  type: 'object' as const,
  properties: {
    filter: {
      type: 'boolean' as const,
      description: 'Only include elements visible on screen (default true).',
    },
  },
};

export const PackagesToolSchema = {
  type: 'object' as const,
  properties: {
    filter: {
      type: 'string' as const,
      enum: ['user', 'system', 'all'],
      description: 'Which packages to list (default all).',
    },
  },
};

export const WaitForToolSchema = {
  type: 'object' as const,
  properties: {
    text: selectorProperties.text,
    resource_id: selectorProperties.resource_id,
    content_description: selectorProperties.content_description,
    gone: { type: 'boolean' as const, description: 'Wait for the element to disappear.' },
    timeout_ms: { type: 'number' as const, description: 'Maximum wait in milliseconds.' },
    interval_ms: { type: 'number' as const, description: 'Polling interval in milliseconds.' },
  },
};

export const ElementToolSchema = {
  type: 'object' as const,
  properties: selectorProperties,
};

export const ElementLongPressToolSchema = {
  type: 'object' as const,
  properties: {
    ...selectorProperties,
    duration: { type: 'number' as const, description: 'Press duration in milliseconds.' },
  },
};

export const ElementScrollToolSchema = {
  type: 'object' as const,
  properties: {
    ...selectorProperties,
    direction: {
      type: 'string' as const,
      enum: ['forward', 'backward', 'up', 'down', 'left', 'right'],
      description: "Scroll direction (default 'forward').",
    },
  },
};

export const ElementSetTextToolSchema = {
  type: 'object' as const,
  properties: {
    ...selectorProperties,
    new_text: { type: 'string' as const, description: 'Text to enter.' },
    clear: { type: 'boolean' as const, description: 'Replace existing text (default true).' },
  },
  required: ['new_text'],
};

export const ElementDragToolSchema = {
  type: 'object' as const,
  properties: {
    ...selectorProperties,
    target_x: coordinate('Drop X coordinate in pixels.'),
    target_y: coordinate('Drop Y coordinate in pixels.'),
  },
  required: ['target_x', 'target_y'],
};

export const ElementToggleToolSchema = {
  type: 'object' as const,
  properties: {
    ...selectorProperties,
    checked: { type: 'boolean' as const, description: 'Desired state; omit to flip.' },
  },
};
