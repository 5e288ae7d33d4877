import { FormattingEngine, SourceFormatter } from './Formatter'
import { BaseFormatter } from './formatters/BaseFormatter'
import { JavaFormatter } from './formatters/JavaFormatter'
import { KotlinFormatter } from './formatters/KotlinFormatter'
import { CommandEngine } from './CommandEngine'
import { BuiltinEngine } from './BuiltinEngine'
import { FormatterName, FormatterNameSchema, ProfileHandle, ProjectConfig } from '../contracts'

const VARIANTS: Record<FormatterName, new (engine: FormattingEngine) => BaseFormatter> = {
  java: JavaFormatter,
  kotlin: KotlinFormatter,
}

/**
 * Factory for the fixed set of formatter variants
 */
export class FormatterFactory {
  /**
   * Create the active formatters in registration order
   * @param names Formatter names; later duplicates are ignored
   * @param engineConfig Engine commands from the project configuration
   * @param profile Profile handed to the builtin engine for languages without a command
   */
  static createFormatters(
    names: readonly FormatterName[],
    engineConfig: ProjectConfig['engine'],
    profile: Readonly<ProfileHandle>
  ): SourceFormatter[] {
    let builtin: BuiltinEngine | null = null
    const formatters: SourceFormatter[] = []

    for (const name of new Set(names)) {
      const command = engineConfig.commands[name]
      let engine: FormattingEngine
      if (command) {
        engine = new CommandEngine(command, engineConfig.timeout)
      } else {
        builtin ??= BuiltinEngine.fromProfile(profile)
        engine = builtin
      }
      formatters.push(new VARIANTS[name](engine))
    }

    return formatters
  }

  /**
   * Name and description of every variant, for the help output
   */
  static availableFormatters(): Array<{ name: FormatterName; shortDescription: string }> {
    const engine = new BuiltinEngine()
    return FormatterNameSchema.options.map((name) => {
      const formatter = new VARIANTS[name](engine)
      return { name: formatter.name, shortDescription: formatter.shortDescription }
    })
  }
}
