/**
 * Keyboard Controls
 *
 * Raw-mode keypress handling for the terminal front end.
 * Maps keys to operator commands; pause and reset are throttled so a held
 * key does not flap the loop.
 */

import { emitKeypressEvents } from 'node:readline'
import { throttle } from '@tanstack/pacer'
import { perceptionKeywords } from '@sweepwatch/perception'

// ============================================================================
// Types
// ============================================================================

type Command = keyof typeof perceptionKeywords.commands

export type Keypress = {
  name?: string
  ctrl?: boolean
  meta?: boolean
  shift?: boolean
}

export type KeyboardCommands = Record<Command, () => void>

type Keybinding = {
  keymaps: Array<string>
  command: Command
}

// ============================================================================
// Keymap
// ============================================================================

const keybindings: Array<Keybinding> = [
  { keymaps: ['q', 'escape', 'ctrl+c'], command: perceptionKeywords.commands.stop },
  { keymaps: ['r'], command: perceptionKeywords.commands.reset },
  { keymaps: ['p', 'space'], command: perceptionKeywords.commands.togglePause },
]

const matchesKeymap = (keymap: string, key: Keypress): boolean => {
  const ctrl = keymap.startsWith('ctrl+')
  const name = ctrl ? keymap.slice('ctrl+'.length) : keymap
  return name === key.name?.toLowerCase() && ctrl === (key.ctrl ?? false) && !key.meta
}

export function resolveKeyCommand(key: Keypress): Command | null {
  const binding = keybindings.find(({ keymaps }) =>
    keymaps.some((keymap) => matchesKeymap(keymap, key)),
  )
  return binding?.command ?? null
}

// ============================================================================
// Attach
// ============================================================================

/**
 * Listen for keys on a TTY. Returns a detach function; on a non-TTY input
 * nothing is attached.
 */
export function attachKeyboardControls(
  input: NodeJS.ReadStream,
  commands: KeyboardCommands,
): () => void {
  if (!input.isTTY) {
    console.log('[Keyboard] Input is not a TTY, keyboard controls disabled')
    return () => {}
  }

  const throttledCommands: KeyboardCommands = {
    stop: commands.stop,
    reset: throttle(commands.reset, { wait: 100 }),
    togglePause: throttle(commands.togglePause, { wait: 100 }),
  }

  const handleKeypress = (_sequence: string | undefined, key: Keypress | undefined) => {
    if (!key) return
    const command = resolveKeyCommand(key)
    if (command) throttledCommands[command]()
  }

  console.log('[Keyboard] q stop, r reset, p pause')
  emitKeypressEvents(input)
  input.setRawMode(true)
  input.on('keypress', handleKeypress)
  input.resume()

  return () => {
    input.off('keypress', handleKeypress)
    input.setRawMode(false)
    input.pause()
  }
}
