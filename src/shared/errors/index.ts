export * from './GameDomainErrors';
