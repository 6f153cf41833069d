// Engine
export { afterTaxIncome, annualTax, effectiveTaxRate } from './rules/engine'
export { applyStrategy } from './rules/strategy'
export type { CalculationStrategy, StrategyKind } from './rules/strategy'
export { getSupportedJurisdictions, resolveStrategy } from './rules/jurisdictions'
export { usTaxBreakdown } from './rules/us'
export { annualLivingCost, homeLivingCost, studyCountryFor, studyLivingCost } from './living/livingCosts'
export { resolveMarket } from './market/marketMapper'
export { interpolateSalary } from './projection/interpolate'
export { projectBaseline } from './projection/baseline'
export { adjustInitialCapital, parseProgramScenario, projectAllPrograms, projectProgram } from './projection/program'
export { hasIncomeData, parsePathScenario, projectAllPaths, projectPath } from './projection/path'
export { calibrate, calibratedEdgeMap, calibrationDiff } from './calibration/calibrate'
export { getRuleNames, ruleBreakdown } from './calibration/rules'
export { DEFAULT_PROFILE } from './calibration/constants'

// Reference data
export {
  buildDecisionGraph,
  buildReferenceContext,
  loadDecisionGraph,
  loadPrograms,
  loadReferenceContext,
} from './reference/loader'
export type { ReferenceContext } from './reference/context'

// Service
export { CareerService } from './service/CareerService'
export { ProfileStore } from './service/ProfileStore'
export { loadConfig } from './config'
export type { AppConfig } from './config'

export { ConfigurationError, MissingIncomeDataError, NotFoundError, ValidationError } from './errors'
export { logger } from './utils/logger'
export type * from './model/types'
export type { PathScenarioInput, ProgramScenarioInput, UserProfileUpdate } from './model/schemas'
