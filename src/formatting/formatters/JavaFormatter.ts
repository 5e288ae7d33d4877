import { BaseFormatter } from './BaseFormatter'

export class JavaFormatter extends BaseFormatter {
  readonly name = 'java' as const
  readonly shortDescription = 'Java source formatter'

  protected getSupportedExtensions(): string[] {
    return ['.java']
  }
}
