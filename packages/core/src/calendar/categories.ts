/**
 * Event display metadata: icon and colour for an event, picked from its
 * activity name, falling back to its type.
 */

import type { CalendarEvent, CalendarEventType } from './types.js'

export interface EventCategoryStyle {
  /** Material icon name */
  icon: string
  /** Hex colour */
  color: string
}

const PALETTE = {
  green: '#4caf50',
  orange: '#ff9800',
  brown: '#795548',
  blue: '#2196f3',
  red: '#f44336',
  purple: '#9c27b0',
  amber: '#ffc107',
  sky: '#03a9f4',
  grey: '#9e9e9e',
} as const

interface KeywordRule {
  keywords: readonly string[]
  style: EventCategoryStyle
}

// First match wins; keywords are matched as substrings of the lower-cased name
const KEYWORD_RULES: readonly KeywordRule[] = [
  { keywords: ['plant', 'sow', 'seed'], style: { icon: 'eco', color: PALETTE.green } },
  { keywords: ['harvest'], style: { icon: 'agriculture', color: PALETTE.orange } },
  { keywords: ['fertili', 'manur', 'compost'], style: { icon: 'scatter_plot', color: PALETTE.brown } },
  { keywords: ['irrigat', 'water'], style: { icon: 'water_drop', color: PALETTE.blue } },
  { keywords: ['pest', 'spray'], style: { icon: 'bug_report', color: PALETTE.red } },
  { keywords: ['prun'], style: { icon: 'content_cut', color: PALETTE.green } },
  { keywords: ['weed'], style: { icon: 'grass', color: PALETTE.green } },
]

const TYPE_FALLBACK: Record<CalendarEventType, EventCategoryStyle> = {
  cropActivity: { icon: 'task_alt', color: PALETTE.grey },
  custom: { icon: 'event', color: PALETTE.purple },
  reminder: { icon: 'notifications', color: PALETTE.amber },
  weather: { icon: 'wb_sunny', color: PALETTE.sky },
}

/**
 * Icon and colour for an event. Uses the event's category (the activity
 * name for template events), or its title when it has none.
 */
export function categoriesOf(event: Pick<CalendarEvent, 'type' | 'category' | 'title'>): EventCategoryStyle {
  const name = (event.category ?? event.title).toLowerCase()

  const rule = KEYWORD_RULES.find((r) => r.keywords.some((keyword) => name.includes(keyword)))
  if (rule) {
    return { ...rule.style }
  }

  return { ...TYPE_FALLBACK[event.type] }
}

/**
 * Categories offered when creating a custom event.
 */
export const CUSTOM_EVENT_CATEGORIES = [
  { value: 'planting', label: 'Planting' },
  { value: 'harvesting', label: 'Harvesting' },
  { value: 'fertilizing', label: 'Fertilizing' },
  { value: 'irrigation', label: 'Irrigation' },
  { value: 'pest_control', label: 'Pest Control' },
  { value: 'custom', label: 'Custom' },
] as const
