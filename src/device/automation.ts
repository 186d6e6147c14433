import { GestureStroke, PackageInfo, PhoneState, RawNode, Rect } from '../types';

export type PackageFilter = 'user' | 'system' | 'all';

/**
 * The capability surface of a connected device. Every call may block on the device
 * for tens to hundreds of milliseconds; callers serialize access.
 */
export interface DeviceAutomation {
  snapshotTree(): Promise<RawNode | null>;
  getScreenBounds(): Promise<Rect>;
  // Resolves false when the device refused or cancelled the gesture.
  performGesture(strokes: GestureStroke[]): Promise<boolean>;
  performGlobalAction(actionId: number): Promise<boolean>;
  getFocusedEditableNode(): Promise<RawNode | null>;
  setNodeText(node: RawNode, text: string): Promise<boolean>;
  sendKeyEvent(keyCode: number): Promise<boolean>;
  launchApp(packageName: string, activity?: string): Promise<boolean>;
  captureScreenshot(hideOverlay: boolean): Promise<Buffer>;
  getPhoneState(): Promise<PhoneState>;
  listPackages(filter: PackageFilter): Promise<PackageInfo[]>;
}

export const GlobalActions = {
  back: 1,
  home: 2,
  recents: 3,
  notifications: 4,
  quick_settings: 5,
  power_dialog: 6,
} as const;

export type GlobalActionName = keyof typeof GlobalActions;

export function isGlobalActionName(value: string): value is GlobalActionName {
  return Object.prototype.hasOwnProperty.call(GlobalActions, value);
}
