import { execaRunner, isCommandAvailable, type CommandRunner } from '../../utils/exec'
import { FuzzyFinderSelector } from './FuzzyFinderSelector'
import { NumericPromptSelector } from './NumericPromptSelector'
import { resolveSelectorKind, type Selector } from './Selector'

export * from './Selector'
export { FuzzyFinderSelector, parseFinderOutput, DROP_KEY } from './FuzzyFinderSelector'
export { NumericPromptSelector } from './NumericPromptSelector'

export interface SelectorOptions {
  override: string | null
  previewCommand: string
  runner?: CommandRunner
}

/**
 * Detect the backend once and hand it back; callers only see `Selector`
 */
export async function createSelector({ override, previewCommand, runner = execaRunner }: SelectorOptions): Promise<Selector> {
  const kind = await resolveSelectorKind(override, (binary) => isCommandAvailable(binary, runner))
  if (kind === 'prompt') return new NumericPromptSelector()
  return new FuzzyFinderSelector(kind, previewCommand, runner)
}
