/**
 * Centralized constants for stepcoach.
 * Vocabulary tables, status messages and defaults live here.
 */

import type { RunFailureKind, SkillKind, SystemElementId } from '../types/index.js';

export const SKILL_KINDS = [
  'single-click',
  'double-click',
  'right-click',
  'drag-to',
  'scroll-up',
  'scroll-down',
  'type-text',
  'press-key',
  'key-combination',
  'wait-duration',
  'wait-for-element',
  'done',
] as const satisfies readonly SkillKind[];

export interface SkillCatalogEntry {
  kind: SkillKind;
  summary: string;
  /** Raw fields the planner must fill for this kind. */
  fields: string;
  example: string;
}

// Shown to the planner so it only emits kinds the grammar accepts
export const SKILL_CATALOG: readonly SkillCatalogEntry[] = [
  { kind: 'single-click', summary: 'Click once with the left mouse button', fields: 'target', example: 'Click the Start button' },
  { kind: 'double-click', summary: 'Double-click with the left mouse button', fields: 'target', example: 'Double-click the Recycle Bin icon' },
  { kind: 'right-click', summary: 'Click with the right mouse button to open a context menu', fields: 'target', example: 'Right-click the desktop' },
  { kind: 'drag-to', summary: 'Drag an item to another place', fields: 'target, target_position', example: 'Drag the file onto the folder' },
  { kind: 'scroll-up', summary: 'Scroll up inside a region', fields: 'target (optional region)', example: 'Scroll up in the page' },
  { kind: 'scroll-down', summary: 'Scroll down inside a region', fields: 'target (optional region)', example: 'Scroll down to the bottom of the list' },
  { kind: 'type-text', summary: 'Type text with the keyboard', fields: 'text', example: 'Type "hello"' },
  { kind: 'press-key', summary: 'Press a single key', fields: 'key', example: 'Press Enter' },
  { kind: 'key-combination', summary: 'Press several keys together', fields: 'hotkey, keys joined with +', example: 'Press Ctrl+C' },
  { kind: 'wait-duration', summary: 'Wait a number of seconds', fields: 'wait_seconds', example: 'Wait 2 seconds' },
  { kind: 'wait-for-element', summary: 'Wait until something appears on screen', fields: 'target', example: 'Wait for the Save dialog' },
  { kind: 'done', summary: 'The goal is reached, nothing left to do', fields: 'none', example: 'Done' },
];

export interface SystemElement {
  id: SystemElementId;
  label: string;
  aliases: readonly string[];
  location: string;
}

export const SYSTEM_ELEMENTS: readonly SystemElement[] = [
  { id: 'close-button', label: 'Close button', aliases: ['close button', 'x button', 'close window button'], location: 'top-right corner of the window' },
  { id: 'minimize-button', label: 'Minimize button', aliases: ['minimize button', 'minimise button'], location: 'top-right corner, left of maximize' },
  { id: 'maximize-button', label: 'Maximize button', aliases: ['maximize button', 'maximise button'], location: 'top-right corner, left of close' },
  { id: 'restore-button', label: 'Restore button', aliases: ['restore button', 'restore down button'], location: 'top-right corner, where maximize was' },
  { id: 'title-bar', label: 'Title bar', aliases: ['title bar', 'window title'], location: 'top edge of the window' },
  { id: 'menu-bar', label: 'Menu bar', aliases: ['menu bar', 'main menu'], location: 'below the title bar' },
  { id: 'status-bar', label: 'Status bar', aliases: ['status bar'], location: 'bottom edge of the window' },
  { id: 'scroll-bar', label: 'Scroll bar', aliases: ['scroll bar', 'scrollbar'], location: 'right edge of the scrollable area' },
  { id: 'start-button', label: 'Start button', aliases: ['start button', 'start menu button', 'start menu', 'windows icon', 'windows button', 'windows logo'], location: 'bottom-left corner of the screen' },
  { id: 'taskbar', label: 'Taskbar', aliases: ['taskbar', 'task bar'], location: 'bottom edge of the screen' },
  { id: 'system-tray', label: 'System tray', aliases: ['system tray', 'notification area', 'tray'], location: 'bottom-right corner of the screen' },
  { id: 'search-box', label: 'Search box', aliases: ['search box', 'search bar', 'search field', 'taskbar search'], location: 'taskbar, right of the Start button' },
  { id: 'desktop', label: 'Desktop', aliases: ['desktop', 'desktop background'], location: 'the whole screen behind the windows' },
  { id: 'ok-button', label: 'OK button', aliases: ['ok button', 'ok'], location: 'bottom of the dialog' },
  { id: 'cancel-button', label: 'Cancel button', aliases: ['cancel button', 'cancel'], location: 'bottom of the dialog, next to OK' },
  { id: 'yes-button', label: 'Yes button', aliases: ['yes button', 'yes'], location: 'bottom of the dialog' },
  { id: 'no-button', label: 'No button', aliases: ['no button', 'no'], location: 'bottom of the dialog, next to Yes' },
  { id: 'apply-button', label: 'Apply button', aliases: ['apply button', 'apply'], location: 'bottom of the dialog' },
  { id: 'text-input', label: 'Text box', aliases: ['text box', 'text field', 'input box', 'input field', 'textbox'], location: 'inside the form' },
  { id: 'password-input', label: 'Password box', aliases: ['password box', 'password field', 'password input'], location: 'inside the sign-in form' },
  { id: 'dropdown', label: 'Dropdown', aliases: ['dropdown', 'drop-down menu', 'dropdown menu', 'combo box'], location: 'inside the form' },
  { id: 'checkbox', label: 'Checkbox', aliases: ['checkbox', 'check box', 'tick box'], location: 'next to its label' },
  { id: 'radio-button', label: 'Radio button', aliases: ['radio button', 'option button'], location: 'next to its label' },
  { id: 'back-button', label: 'Back button', aliases: ['back button', 'back arrow'], location: 'top-left of the browser or app' },
  { id: 'forward-button', label: 'Forward button', aliases: ['forward button', 'forward arrow'], location: 'right of the Back button' },
  { id: 'refresh-button', label: 'Refresh button', aliases: ['refresh button', 'reload button'], location: 'near the address bar' },
  { id: 'home-button', label: 'Home button', aliases: ['home button', 'home icon'], location: 'near the address bar' },
];

// Lower-case spellings mapped to the display name of the key
export const KEY_ALIASES: Readonly<Record<string, string>> = {
  enter: 'Enter',
  return: 'Enter',
  esc: 'Esc',
  escape: 'Esc',
  tab: 'Tab',
  backspace: 'Backspace',
  delete: 'Delete',
  del: 'Delete',
  space: 'Space',
  spacebar: 'Space',
  up: 'Up',
  'up arrow': 'Up',
  'arrow up': 'Up',
  down: 'Down',
  'down arrow': 'Down',
  'arrow down': 'Down',
  left: 'Left',
  'left arrow': 'Left',
  'arrow left': 'Left',
  right: 'Right',
  'right arrow': 'Right',
  'arrow right': 'Right',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  'page up': 'PageUp',
  pagedown: 'PageDown',
  'page down': 'PageDown',
  ctrl: 'Ctrl',
  control: 'Ctrl',
  alt: 'Alt',
  shift: 'Shift',
  win: 'Win',
  windows: 'Win',
  super: 'Win',
  meta: 'Win',
  cmd: 'Cmd',
  command: 'Cmd',
  'print screen': 'PrintScreen',
  printscreen: 'PrintScreen',
  prtsc: 'PrintScreen',
};

export const COMMON_HOTKEYS: readonly { keys: string; purpose: string }[] = [
  { keys: 'Ctrl+C', purpose: 'copy' },
  { keys: 'Ctrl+V', purpose: 'paste' },
  { keys: 'Ctrl+X', purpose: 'cut' },
  { keys: 'Ctrl+Z', purpose: 'undo' },
  { keys: 'Ctrl+Y', purpose: 'redo' },
  { keys: 'Ctrl+A', purpose: 'select all' },
  { keys: 'Ctrl+S', purpose: 'save' },
  { keys: 'Ctrl+F', purpose: 'find' },
  { keys: 'Ctrl+P', purpose: 'print' },
  { keys: 'Ctrl+N', purpose: 'new window or document' },
  { keys: 'Ctrl+W', purpose: 'close tab' },
  { keys: 'Alt+F4', purpose: 'close window' },
  { keys: 'Alt+Tab', purpose: 'switch window' },
  { keys: 'Win+D', purpose: 'show desktop' },
  { keys: 'Win+E', purpose: 'open file explorer' },
  { keys: 'Win+R', purpose: 'open the Run dialog' },
  { keys: 'Ctrl+Shift+Esc', purpose: 'open task manager' },
];

export const SCREEN_KEYWORDS = {
  LOADING: ['loading', 'please wait', 'spinner', 'progress bar', 'buffering', 'connecting'],
  ERROR: ['error', 'failed', 'failure', 'not responding', 'cannot connect', "can't connect", 'crashed', 'exception'],
} as const;

export const STATUS_MESSAGES = {
  LOOKING: 'Let me take a look at your screen...',
  PLANNING: 'Working out the steps...',
  CHECKING: 'Checking what happened...',
  STILL_LOADING: 'The screen is still loading, please wait a moment...',
  TRY_AGAIN: 'That did not seem to work. Please try again.',
  KEEP_WAITING: 'Something on the screen moved by itself. Go ahead with the step when ready.',
  REPLANNING: 'Let me find another way...',
  GOAL_REACHED: 'All done, the goal is reached.',
  ALL_STEPS_DONE: 'All steps are finished.',
} as const;

export const HELP_MESSAGES: Readonly<Record<RunFailureKind, string>> = {
  PlanEmpty: 'I could not work out how to do this from here. Please ask someone nearby for help.',
  GoalUnreachable: 'I tried several ways but could not get there. Please ask someone nearby for help.',
  Cancelled: 'Stopped. Ask someone nearby if you still need help with this.',
  UnsafeGoal:
    'This looks like it could be a scam, so I will not help with it. Please talk to someone you trust before going on.',
};

export const FEEDBACK_REASON_PREFIX = 'User feedback: ';

export type RiskLevel = 'safe' | 'low' | 'medium' | 'high' | 'critical';

export const RISK_LEVELS: readonly RiskLevel[] = ['safe', 'low', 'medium', 'high', 'critical'];

export interface SafetyRules {
  scamKeywords: readonly string[];
  /** Two or more phrases from one group mark a scam pattern. */
  scamPatterns: readonly (readonly string[])[];
  sensitiveInfo: readonly string[];
  sensitiveOperations: readonly string[];
  popupKeywords: readonly string[];
}

/**
 * Phrase tables for the keyword safety screen. Matching is case-insensitive
 * on whole words.
 */
export const SAFETY_RULES: SafetyRules = {
  scamKeywords: [
    'gift card',
    'wire transfer',
    'remote access',
    'tech support',
    'lottery',
    'inheritance',
    'bitcoin',
    'crypto investment',
  ],
  scamPatterns: [
    ['police', 'court', 'arrest', 'warrant', 'tax office'],
    ['customer service', 'refund', 'order problem', 'account frozen', 'account locked'],
    ['guaranteed return', 'high return', 'insider', 'investment'],
    ['you have won', 'winner', 'prize', 'claim', 'free'],
    ['urgent', 'emergency', 'send money', "don't tell"],
  ],
  sensitiveInfo: [
    'password',
    'pin code',
    'verification code',
    'one-time code',
    'bank card',
    'credit card',
    'cvv',
    'social security',
  ],
  sensitiveOperations: ['transfer money', 'send money', 'payment', 'pay', 'purchase', 'delete', 'uninstall', 'format drive'],
  popupKeywords: ['congratulations', 'winner', 'claim', 'prize', 'free', 'limited time'],
};

export const SAFETY_MESSAGES = {
  SCAM_KEYWORD: (phrase: string) => `This mentions "${phrase}", which scammers often use.`,
  SCAM_PATTERN: 'This looks like a common scam.',
  SENSITIVE_INFO: (phrase: string) => `This involves private information (${phrase}).`,
  SENSITIVE_OPERATION: (phrase: string) => `This involves "${phrase}". Please make sure you want to go ahead.`,
  POPUP: 'The screen may be showing an advert pop-up.',
  SUGGESTIONS: {
    unsafe: 'Do not share personal details with strangers. Check with family first if unsure.',
    operation: 'Check the details carefully before confirming.',
    popup: 'It is usually safe to close it.',
  },
  TONE: {
    safe: '',
    low: 'Just so you know: ',
    medium: 'Please be careful: ',
    high: 'Warning, this looks suspicious: ',
    critical: 'Stop, this may be a scam: ',
  } satisfies Record<RiskLevel, string>,
} as const;
