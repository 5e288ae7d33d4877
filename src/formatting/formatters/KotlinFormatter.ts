import { BaseFormatter } from './BaseFormatter'

export class KotlinFormatter extends BaseFormatter {
  readonly name = 'kotlin' as const
  readonly shortDescription = 'Kotlin source and script formatter'

  protected getSupportedExtensions(): string[] {
    return ['.kt', '.kts']
  }
}
