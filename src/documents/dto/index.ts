export * from './upload-document.dto';
