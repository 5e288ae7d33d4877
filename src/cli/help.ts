import { OPTIONS } from './args'
import { FormatterFactory } from '../formatting/FormatterFactory'

export function formatHelp(): string {
  const rows = OPTIONS.map((option) => {
    const names = `-${option.short},--${option.long}`
    return option.kind === 'value' ? `${names} <${option.argName}>` : names
  })
  const width = Math.max(...rows.map((row) => row.length)) + 3

  let message = 'usage: srcfmt [options] <file-or-directory>\n'
  OPTIONS.forEach((option, i) => {
    message += ` ${rows[i].padEnd(width)}${option.description}\n`
  })

  message += '\nAvailable source formatters : \n'
  for (const formatter of FormatterFactory.availableFormatters()) {
    message += `\t* ${formatter.name} (${formatter.shortDescription})\n`
  }

  return message.trimEnd()
}
