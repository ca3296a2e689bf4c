/**
 * Interactive Query Menu
 *
 * awaiting → dispatch(kind) → rendering → awaiting, or exit.
 * Bad input and store errors are reported and the menu asks again.
 */

import type * as readline from 'node:readline/promises'
import { errorMessage, type QueryKind } from '../errors.js'
import { parseQueryInput } from '../query/input.js'
import type { CalendarQuery, QueryResult } from '../query/query-engine.js'
import { renderResult } from '../query/render.js'

export interface MenuIO {
  /** Resolves null once the input is closed */
  ask(query: string): Promise<string | null>
  print(line: string): void
}

type MenuState =
  | { name: 'awaiting' }
  | { name: 'dispatch'; kind: QueryKind }
  | { name: 'rendering'; result: QueryResult }
  | { name: 'exit' }

export const MENU_CHOICES = new Map<string, QueryKind>([
  ['1', 'day'],
  ['2', 'week'],
  ['3', 'month'],
  ['4', 'year'],
  ['5', 'all'],
])

const INPUT_PROMPTS: Record<QueryKind, string> = {
  day: 'Datum (YYYY-MM-DD): ',
  week: 'Jahr und Woche (YYYY-WW): ',
  month: 'Jahr und Monat (YYYY-MM): ',
  year: 'Jahr (YYYY): ',
  all: '',
}

export const MENU_LINES = [
  '',
  '='.repeat(80),
  'Welche Termine möchten Sie anzeigen?',
  '='.repeat(80),
  '  1) Bestimmter Tag (YYYY-MM-DD)',
  '  2) Bestimmte Woche (YYYY-WW)',
  '  3) Bestimmter Monat (YYYY-MM)',
  '  4) Bestimmtes Jahr (YYYY)',
  '  5) Alle Termine',
  '  0) Beenden',
  '='.repeat(80),
]

export const INVALID_CHOICE = 'Ungültige Eingabe. Bitte versuchen Sie es erneut.'
export const GOODBYE = 'Auf Wiedersehen!'

export async function runMenu(query: CalendarQuery, io: MenuIO): Promise<void> {
  let state: MenuState = { name: 'awaiting' }

  while (state.name !== 'exit') {
    switch (state.name) {
      case 'awaiting': {
        MENU_LINES.forEach((line) => io.print(line))
        const answer = await io.ask('\nIhre Wahl: ')
        if (answer === null) {
          state = { name: 'exit' }
          break
        }
        const choice = answer.trim()
        if (choice === '0') {
          io.print('')
          io.print(GOODBYE)
          state = { name: 'exit' }
          break
        }
        const kind = MENU_CHOICES.get(choice)
        if (kind === undefined) {
          io.print(INVALID_CHOICE)
        } else {
          state = { name: 'dispatch', kind }
        }
        break
      }

      case 'dispatch': {
        let text = ''
        if (state.kind !== 'all') {
          const answer = await io.ask(INPUT_PROMPTS[state.kind])
          if (answer === null) {
            state = { name: 'exit' }
            break
          }
          text = answer
        }
        try {
          const result = await query.run(parseQueryInput(state.kind, text))
          state = { name: 'rendering', result }
        } catch (err) {
          io.print(`Fehler: ${errorMessage(err)}`)
          state = { name: 'awaiting' }
        }
        break
      }

      case 'rendering':
        renderResult(state.result).forEach((line) => io.print(line))
        state = { name: 'awaiting' }
        break
    }
  }
}

/**
 * MenuIO over a readline interface. A pending question resolves null when
 * the interface closes (Ctrl+D, end of piped input).
 */
export function readlineIO(rl: readline.Interface, print: (line: string) => void = console.log): MenuIO {
  let closed = false
  const onClose = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true
      resolve(null)
    })
  })

  return {
    async ask(query) {
      if (closed) return null
      return Promise.race([rl.question(query), onClose])
    },
    print,
  }
}
