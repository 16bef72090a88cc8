export { AnalyzeBrandUseCase } from './analyze-brand.use-case';
