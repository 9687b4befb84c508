import type { AppConfig } from './config';
import { getFirebaseServices } from './firebase';
import type { DocumentStore } from './services/backend/DocumentStore';
import { FirebaseIdentityProvider } from './services/backend/FirebaseIdentityProvider';
import { FirestoreDocumentStore } from './services/backend/FirestoreDocumentStore';
import type { IdentityProvider } from './services/backend/IdentityProvider';
import { InMemoryDocumentStore } from './services/backend/memory/InMemoryDocumentStore';
import { InMemoryIdentityProvider } from './services/backend/memory/InMemoryIdentityProvider';
import { PostUseCase } from './services/domain/posts/PostUseCase';
import { UserUseCase } from './services/domain/users/UserUseCase';
import type { PostRepository } from './services/repositories/posts/PostRepository';
import { StorePostRepository } from './services/repositories/posts/StorePostRepository';
import type { UserRepository } from './services/repositories/users/UserRepository';
import { StoreUserRepository } from './services/repositories/users/StoreUserRepository';
import { Session, bindSessionToIdentity } from './services/session/Session';
import { LoginViewState } from './viewState/LoginViewState';
import { PostViewState } from './viewState/PostViewState';
import { ScreenRouter } from './viewState/ScreenRouter';

export type AppContainer = {
  identityProvider: IdentityProvider;
  documentStore: DocumentStore;
  session: Session;
  userRepository: UserRepository;
  postRepository: PostRepository;
  userUseCase: UserUseCase;
  postUseCase: PostUseCase;
  loginViewState: LoginViewState;
  postViewState: PostViewState;
  router: ScreenRouter;
  dispose: () => void;
};

export type CreateAppContainerOptions = {
  config: AppConfig;
  identityProvider?: IdentityProvider;
  documentStore?: DocumentStore;
  now?: () => Date;
};

type Backends = {
  identityProvider: IdentityProvider;
  documentStore: DocumentStore;
};

function createBackends(options: CreateAppContainerOptions): Backends {
  const { config } = options;
  if (options.identityProvider && options.documentStore) {
    return { identityProvider: options.identityProvider, documentStore: options.documentStore };
  }

  if (config.backend === 'memory') {
    return {
      identityProvider: options.identityProvider ?? new InMemoryIdentityProvider(),
      documentStore: options.documentStore ?? new InMemoryDocumentStore(),
    };
  }

  const services = getFirebaseServices(config.firebase, config.emulators);
  return {
    identityProvider: options.identityProvider ?? new FirebaseIdentityProvider(services.auth),
    documentStore: options.documentStore ?? new FirestoreDocumentStore(services.db),
  };
}

export function createAppContainer(options: CreateAppContainerOptions): AppContainer {
  const { identityProvider, documentStore } = createBackends(options);
  const session = new Session({
    ttlMs: options.config.sessionTtlMs,
    ...(options.now ? { now: options.now } : {}),
  });
  const unbindSession = bindSessionToIdentity(session, identityProvider);

  const userRepository = new StoreUserRepository(identityProvider, documentStore);
  const postRepository = new StorePostRepository(documentStore, identityProvider, session);
  const userUseCase = new UserUseCase(userRepository, session, options.now);
  const postUseCase = new PostUseCase(postRepository, session, options.now);
  const loginViewState = new LoginViewState(userUseCase, session);
  const postViewState = new PostViewState(postUseCase, session);
  const router = new ScreenRouter(session);

  return {
    identityProvider,
    documentStore,
    session,
    userRepository,
    postRepository,
    userUseCase,
    postUseCase,
    loginViewState,
    postViewState,
    router,
    dispose: () => {
      unbindSession();
      loginViewState.dispose();
      postViewState.dispose();
      router.dispose();
    },
  };
}
