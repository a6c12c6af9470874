// @persona-desk/modules
// Documents, meetings, assessments and consultation

export * from './context';
export * from './format';
export * from './documents/generator';
export * from './meetings/schemas';
export * from './meetings/facilitator';
export * from './assessments/frameworks';
export * from './assessments/assessor';
export * from './consultation/schemas';
export * from './consultation/consultant';
