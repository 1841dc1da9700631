export enum ErrorKind {
  Validation = 'Validation',
  Authorization = 'Authorization',
  State = 'State',
  BudgetExhaustion = 'BudgetExhaustion',
}

export enum ErrorCode {
  // Validation
  ZeroAmount = 'ZeroAmount',
  InvalidAmount = 'InvalidAmount',
  ZeroAddress = 'ZeroAddress',
  InvalidAddress = 'InvalidAddress',
  LengthMismatch = 'LengthMismatch',
  InvalidCategory = 'InvalidCategory',
  InvalidRate = 'InvalidRate',
  InvalidRequestId = 'InvalidRequestId',
  InvalidReferralType = 'InvalidReferralType',
  PoolNotFound = 'PoolNotFound',
  UnknownToken = 'UnknownToken',
  // Authorization
  NotOwner = 'NotOwner',
  NotAllowed = 'NotAllowed',
  InvalidSignature = 'InvalidSignature',
  InvalidProof = 'InvalidProof',
  UserBanned = 'UserBanned',
  // State
  Paused = 'Paused',
  ReentrantCall = 'ReentrantCall',
  InsufficientStake = 'InsufficientStake',
  PoolNotStarted = 'PoolNotStarted',
  PoolAlreadyExists = 'PoolAlreadyExists',
  DuplicateRequest = 'DuplicateRequest',
  NothingToClaim = 'NothingToClaim',
  InvalidDuration = 'InvalidDuration',
  InvalidClaimAmount = 'InvalidClaimAmount',
  AlreadyClaimed = 'AlreadyClaimed',
  AirdropNotStarted = 'AirdropNotStarted',
  InsufficientBalance = 'InsufficientBalance',
  InsufficientAllowance = 'InsufficientAllowance',
  // Budget exhaustion
  BudgetExceeded = 'BudgetExceeded',
}

export abstract class ContractError extends Error {
  public abstract readonly kind: ErrorKind;

  constructor(
    public readonly code: ErrorCode,
    message?: string,
  ) {
    super(message ? `${code}: ${message}` : code);
    this.name = new.target.name;
  }
}

/**
 * Malformed caller input, rejected before anything is read from state
 */
export class ValidationError extends ContractError {
  public readonly kind = ErrorKind.Validation;
}

export class AuthorizationError extends ContractError {
  public readonly kind = ErrorKind.Authorization;
}

export class StateError extends ContractError {
  public readonly kind = ErrorKind.State;
}

/**
 * The reward supply cannot cover the request. Never paid out partially.
 */
export class BudgetExhaustionError extends ContractError {
  public readonly kind = ErrorKind.BudgetExhaustion;
}

export function isContractError(error: unknown): error is ContractError {
  return error instanceof ContractError;
}
