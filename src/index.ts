export { ConfigError, loadConfig } from './config';
export type { AppConfig, EmulatorConfig, FirebaseClientConfig } from './config';
export { createAppContainer } from './container';
export type { AppContainer, CreateAppContainerOptions } from './container';
export { getFirebaseServices } from './firebase';
export type { FirebaseServices } from './firebase';

export * from './models/post';
export * from './models/user';
export * from './services/common/errors';

export type { DocumentData, DocumentStore, StoredDocument } from './services/backend/DocumentStore';
export type { IdentityProvider, UserChangeListener } from './services/backend/IdentityProvider';
export { FirebaseIdentityProvider } from './services/backend/FirebaseIdentityProvider';
export { FirestoreDocumentStore } from './services/backend/FirestoreDocumentStore';
export { InMemoryDocumentStore } from './services/backend/memory/InMemoryDocumentStore';
export { InMemoryIdentityProvider } from './services/backend/memory/InMemoryIdentityProvider';

export type { PostRepository } from './services/repositories/posts/PostRepository';
export { StorePostRepository } from './services/repositories/posts/StorePostRepository';
export type { UserRepository } from './services/repositories/users/UserRepository';
export { StoreUserRepository } from './services/repositories/users/StoreUserRepository';

export { PostUseCase } from './services/domain/posts/PostUseCase';
export { UserUseCase } from './services/domain/users/UserUseCase';
export { Session, bindSessionToIdentity } from './services/session/Session';
export type { SessionOptions, SessionSnapshot } from './services/session/Session';

export { LoginViewState } from './viewState/LoginViewState';
export type { LoginPhase, LoginState } from './viewState/LoginViewState';
export { PostViewState } from './viewState/PostViewState';
export type { PostListState } from './viewState/PostViewState';
export { ScreenRouter, resolveScreen } from './viewState/ScreenRouter';
export type { RouterState, Screen } from './viewState/ScreenRouter';
export { ViewStateStore } from './viewState/ViewStateStore';
export type { AsyncStatus, ViewSnapshot } from './viewState/ViewStateStore';
export { loginErrorMessage, postErrorMessage } from './viewState/errorMessages';
