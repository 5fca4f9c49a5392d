import { parseStringPromise } from 'xml2js';
import type { UiBounds, UiElement } from '../sessions/types.js';

// Android widget classes mapped to short roles
const ROLE_MAPPING: Record<string, string> = {
  'android.widget.Button': 'button',
  'android.widget.ImageButton': 'button',
  'android.widget.EditText': 'input',
  'android.widget.TextView': 'text',
  'android.widget.ImageView': 'image',
  'android.widget.CheckBox': 'checkbox',
  'android.widget.RadioButton': 'radio',
  'android.widget.Switch': 'switch',
  'android.widget.ToggleButton': 'toggle',
  'android.widget.Spinner': 'select',
  'android.widget.SeekBar': 'slider',
  'android.widget.ProgressBar': 'progress',
  'android.widget.ScrollView': 'scroll',
  'android.widget.ListView': 'list',
  'android.widget.FrameLayout': 'container',
  'android.widget.LinearLayout': 'container',
  'android.widget.RelativeLayout': 'container',
  'android.view.View': 'view',
  'android.view.ViewGroup': 'container',
  'androidx.recyclerview.widget.RecyclerView': 'list',
  'androidx.constraintlayout.widget.ConstraintLayout': 'container',
  'com.google.android.material.button.MaterialButton': 'button',
  'com.google.android.material.textfield.TextInputEditText': 'input',
};

export class HierarchyParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HierarchyParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseBounds(boundsStr: string | undefined): UiBounds | null {
  if (!boundsStr) return null;

  // "[x1,y1][x2,y2]"
  const match = boundsStr.match(/\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]/);
  if (!match) return null;

  return {
    x1: parseInt(match[1], 10),
    y1: parseInt(match[2], 10),
    x2: parseInt(match[3], 10),
    y2: parseInt(match[4], 10),
  };
}

export function roleFor(className: string): string {
  const mapped = ROLE_MAPPING[className];
  if (mapped) return mapped;
  const short = className.split('.').pop();
  return short ? short.toLowerCase() : 'unknown';
}

function attributesOf(node: Record<string, unknown>): Record<string, string> {
  const attrs = node['$'];
  if (!isRecord(attrs)) return {};
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

function childNodes(node: Record<string, unknown>): Record<string, unknown>[] {
  const children = node['node'];
  if (!Array.isArray(children)) return [];
  return children.filter(isRecord);
}

function toElement(node: Record<string, unknown>): UiElement {
  const attrs = attributesOf(node);
  const className = attrs['class'] ?? '';
  return {
    role: roleFor(className),
    className,
    text: attrs['text'] ?? '',
    resourceId: attrs['resource-id'] ?? '',
    contentDesc: attrs['content-desc'] ?? '',
    bounds: parseBounds(attrs['bounds']),
    clickable: attrs['clickable'] === 'true',
    children: childNodes(node).map(toElement),
  };
}

export async function parseUiHierarchy(xml: string): Promise<UiElement[]> {
  const start = xml.indexOf('<hierarchy');
  const end = xml.lastIndexOf('</hierarchy>');
  if (start === -1 || end === -1) {
    throw new HierarchyParseError('No <hierarchy> element in UI dump');
  }

  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml.slice(start, end + '</hierarchy>'.length));
  } catch (err) {
    throw new HierarchyParseError(`Malformed UI dump: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new HierarchyParseError('Malformed UI dump');
  }
  const root = parsed['hierarchy'];
  // An empty <hierarchy/> parses to a bare string
  if (!isRecord(root)) return [];

  return childNodes(root).map(toElement);
}

export function serializeUiTree(tree: readonly UiElement[]): string {
  return JSON.stringify(tree);
}

// Visible text and content descriptions, one per line, in document order
export function extractText(tree: readonly UiElement[]): string {
  const lines: string[] = [];
  const visit = (element: UiElement) => {
    const label = element.text.trim() || element.contentDesc.trim();
    if (label) lines.push(label);
    element.children.forEach(visit);
  };
  tree.forEach(visit);
  return lines.join('\n');
}

export interface ClickableElement {
  label: string;
  role: string;
  resourceId: string;
  centerX: number;
  centerY: number;
}

export function listClickable(tree: readonly UiElement[]): ClickableElement[] {
  const found: ClickableElement[] = [];
  const visit = (element: UiElement) => {
    if (element.clickable && element.bounds) {
      found.push({
        label: element.text.trim() || element.contentDesc.trim() || element.resourceId.split('/').pop() || '',
        role: element.role,
        resourceId: element.resourceId,
        centerX: Math.round((element.bounds.x1 + element.bounds.x2) / 2),
        centerY: Math.round((element.bounds.y1 + element.bounds.y2) / 2),
      });
    }
    element.children.forEach(visit);
  };
  tree.forEach(visit);
  return found;
}
