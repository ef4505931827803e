import { Request, Response, NextFunction } from 'express';
import { sign } from 'jsonwebtoken';
import { authenticate } from '../../src/middleware/auth.middleware';
import { authorize } from '../../src/middleware/rbac.middleware';
import { PERMISSIONS } from '../../src/config/permissions';

const SECRET = 'test-secret';
const USER_ID = '64b7f0c2a1b2c3d4e5f60718';

describe('Auth Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: NextFunction;

  beforeEach(() => {
    mockRequest = {
      headers: {},
    };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
    nextFunction = jest.fn();
  });

  describe('authenticate middleware', () => {
    it('should return 401 when no authorization header is present', () => {
      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: 'no_token',
          message: 'Authentication token is missing or malformed.',
        },
      });
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should return 401 when authorization header does not start with Bearer', () => {
      // Arrange
      mockRequest.headers = { authorization: 'Basic dXNlcjpwYXNz' };

      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should return 401 when token is signed with another secret', () => {
      // Arrange
      const token = sign({ sub: USER_ID, role: 'admin' }, 'other-secret');
      mockRequest.headers = { authorization: `Bearer ${token}` };

      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: 'invalid_token',
          message: 'Authentication token is invalid or has expired.',
        },
      });
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should return 401 when the role claim is not a known role', () => {
      // Arrange
      const token = sign({ sub: USER_ID, role: 'superuser' }, SECRET);
      mockRequest.headers = { authorization: `Bearer ${token}` };

      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should return 401 when the subject is not a Mongo id', () => {
      // Arrange
      const token = sign({ sub: 'user_1', role: 'user' }, SECRET);
      mockRequest.headers = { authorization: `Bearer ${token}` };

      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(401);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: 'invalid_token',
          message: 'Authentication token is invalid or has expired.',
        },
      });
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should populate req.user and call next for a valid token', () => {
      // Arrange
      const token = sign({ sub: USER_ID, role: 'service' }, SECRET);
      mockRequest.headers = { authorization: `Bearer ${token}` };

      // Act
      authenticate(SECRET)(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(nextFunction).toHaveBeenCalledTimes(1);
      expect(mockRequest.user).toMatchObject({ sub: USER_ID, role: 'service' });
      expect(mockResponse.status).not.toHaveBeenCalled();
    });
  });

  describe('authorize middleware', () => {
    it('should return 500 when authenticate has not run', () => {
      // Act
      authorize([PERMISSIONS.PUSH_SEND])(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(500);
      expect(nextFunction).not.toHaveBeenCalled();
    });

    it('should return 403 when the role lacks the permission', () => {
      // Arrange
      mockRequest.user = { sub: 'user_1', role: 'user' };

      // Act
      authorize([PERMISSIONS.PUSH_SEND])(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(mockResponse.status).toHaveBeenCalledWith(403);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: 'permission_denied',
          message: 'You do not have the required role or permissions.',
        },
      });
    });

    it('should call next when the role has the permission', () => {
      // Arrange
      mockRequest.user = { sub: 'svc_1', role: 'service' };

      // Act
      authorize([PERMISSIONS.PUSH_SEND])(mockRequest as Request, mockResponse as Response, nextFunction);

      // Assert
      expect(nextFunction).toHaveBeenCalledTimes(1);
    });
  });
});
