export { toRiskPercentage, buildRiskResult } from './shared.js';
export {
  HYPERTENSION_FIELDS,
  HYPERTENSION_FACTOR_CHECKS,
  hypertensionRules,
  calculateHypertensionRisk,
  hypertensionStage,
} from './hypertension.js';
export {
  DIABETES_FIELDS,
  DIABETES_FACTOR_CHECKS,
  diabetesRules,
  calculateDiabetesRisk,
  diabetesStage,
} from './diabetes.js';
export {
  KIDNEY_DISEASE_FIELDS,
  kidneyDiseaseRules,
  calculateKidneyDiseaseRisk,
  kidneyDiseaseStage,
  type KidneyDiseaseInputs,
} from './kidney-disease.js';
export {
  STROKE_FIELDS,
  STROKE_RULES,
  STROKE_FACTOR_CHECKS,
  calculateStrokeRisk,
  strokeStage,
} from './stroke.js';
export {
  HEART_DISEASE_FIELDS,
  HEART_DISEASE_RULES,
  HEART_DISEASE_FACTOR_CHECKS,
  calculateHeartDiseaseRisk,
  heartDiseaseStage,
} from './heart-disease.js';
