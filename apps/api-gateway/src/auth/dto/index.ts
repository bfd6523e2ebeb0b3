export { LoginDto, RegisterDto } from './credentials.dto';
export { AuthResponseDto } from './auth-response.dto';
export { UserProfileDto } from './user-profile.dto';
