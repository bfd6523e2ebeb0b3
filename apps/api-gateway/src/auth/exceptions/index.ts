export {
  AccountUnavailableException,
  EmailAlreadyRegisteredException,
  InvalidCredentialsException,
} from './auth.exceptions';
