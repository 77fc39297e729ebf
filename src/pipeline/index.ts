export * from './radar-pipeline';
export * from './stored-report';
export * from './factory';
