import {
  BadRequestException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { DocumentStore } from '../database/document-store';
import { User } from '../database/entities/user.entity';
import { hashPassword } from '../helpers/password-hash';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';

export interface LoginResult {
  user_id: string;
  name: string;
  email: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(private readonly store: DocumentStore) {}

  /**
   * The existence check and the insert are separate round trips, so two
   * concurrent registrations with the same email can both succeed.
   */
  async register(dto: RegisterDto): Promise<{ user_id: string }> {
    const existing = await this.store.findOne(User, { email: dto.email });
    if (existing) {
      throw new BadRequestException('Email already registered');
    }

    const userId = await this.store.createDocument(User, {
      name: dto.name,
      email: dto.email,
      password_hash: hashPassword(dto.password),
      avatar_url: null,
    });
    this.logger.log(`Registered user ${userId}`);
    return { user_id: userId };
  }

  async login(dto: LoginDto): Promise<LoginResult> {
    const user = await this.store.findOne(User, { email: dto.email });
    if (!user || user.password_hash !== hashPassword(dto.password)) {
      throw new UnauthorizedException('Invalid credentials');
    }
    return {
      user_id: user._id.toHexString(),
      name: user.name,
      email: user.email,
    };
  }
}
