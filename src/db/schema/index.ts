export { runs } from './runs';
export { anomalies } from './anomalies';
