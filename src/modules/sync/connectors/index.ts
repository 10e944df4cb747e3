export * from './lms-connector';
export * from './lms-connector.registry';
export * from './canvas.connector';
export * from './moodle.connector';
export * from './blackboard.connector';
