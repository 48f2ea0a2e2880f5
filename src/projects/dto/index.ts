export * from './create-project.dto';
export * from './generate-section.dto';
