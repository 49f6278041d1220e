/**
 * Hotkey labels and modifier masks.
 * Key codes are macOS virtual key codes (kVK_ANSI_*), modifier bits are the
 * Carbon event modifier flags, so stored shortcuts stay compatible with the
 * native hotkey registration.
 */

export interface HotkeyKeyOption {
  title: string
  keyCode: number
}

export interface Modifiers {
  command: boolean
  option: boolean
  control: boolean
  shift: boolean
}

const COMMAND_MASK = 1 << 8
const SHIFT_MASK = 1 << 9
const OPTION_MASK = 1 << 11
const CONTROL_MASK = 1 << 12

export const KEY_OPTIONS: readonly HotkeyKeyOption[] = [
  { title: 'A', keyCode: 0x00 },
  { title: 'B', keyCode: 0x0b },
  { title: 'C', keyCode: 0x08 },
  { title: 'D', keyCode: 0x02 },
  { title: 'E', keyCode: 0x0e },
  { title: 'F', keyCode: 0x03 },
  { title: 'G', keyCode: 0x05 },
  { title: 'H', keyCode: 0x04 },
  { title: 'I', keyCode: 0x22 },
  { title: 'J', keyCode: 0x26 },
  { title: 'K', keyCode: 0x28 },
  { title: 'L', keyCode: 0x25 },
  { title: 'M', keyCode: 0x2e },
  { title: 'N', keyCode: 0x2d },
  { title: 'O', keyCode: 0x1f },
  { title: 'P', keyCode: 0x23 },
  { title: 'Q', keyCode: 0x0c },
  { title: 'R', keyCode: 0x0f },
  { title: 'S', keyCode: 0x01 },
  { title: 'T', keyCode: 0x11 },
  { title: 'U', keyCode: 0x20 },
  { title: 'V', keyCode: 0x09 },
  { title: 'W', keyCode: 0x0d },
  { title: 'X', keyCode: 0x07 },
  { title: 'Y', keyCode: 0x10 },
  { title: 'Z', keyCode: 0x06 },
  { title: '0', keyCode: 0x1d },
  { title: '1', keyCode: 0x12 },
  { title: '2', keyCode: 0x13 },
  { title: '3', keyCode: 0x14 },
  { title: '4', keyCode: 0x15 },
  { title: '5', keyCode: 0x17 },
  { title: '6', keyCode: 0x16 },
  { title: '7', keyCode: 0x1a },
  { title: '8', keyCode: 0x1c },
  { title: '9', keyCode: 0x19 },
]

/** E */
export const DEFAULT_KEY_CODE = 0x0e

export function keyTitle(keyCode: number): string {
  return KEY_OPTIONS.find((option) => option.keyCode === keyCode)?.title ?? `KeyCode ${keyCode}`
}

export function makeModifiers({ command, option, control, shift }: Modifiers): number {
  let mask = 0
  if (command) mask |= COMMAND_MASK
  if (option) mask |= OPTION_MASK
  if (control) mask |= CONTROL_MASK
  if (shift) mask |= SHIFT_MASK
  return mask
}

export function splitModifiers(mask: number): Modifiers {
  return {
    command: (mask & COMMAND_MASK) !== 0,
    option: (mask & OPTION_MASK) !== 0,
    control: (mask & CONTROL_MASK) !== 0,
    shift: (mask & SHIFT_MASK) !== 0,
  }
}

/** e.g. "Cmd+Option+Shift+K" */
export function hotkeyDisplayString(keyCode: number, modifiers: number): string {
  const { command, option, control, shift } = splitModifiers(modifiers)
  const parts: string[] = []
  if (command) parts.push('Cmd')
  if (option) parts.push('Option')
  if (control) parts.push('Control')
  if (shift) parts.push('Shift')
  parts.push(keyTitle(keyCode))
  return parts.join('+')
}
