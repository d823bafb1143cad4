import { TokenType } from "./tokens.js";

export const KEYWORDS: Map<string, TokenType> = new Map([
  ["and", TokenType.And],
  ["class", TokenType.Class],
  ["else", TokenType.Else],
  ["false", TokenType.False],
  ["fun", TokenType.Fun],
  ["for", TokenType.For],
  ["if", TokenType.If],
  ["nil", TokenType.Nil],
  ["or", TokenType.Or],
  ["print", TokenType.Print],
  ["return", TokenType.Return],
  ["super", TokenType.Super],
  ["this", TokenType.This],
  ["true", TokenType.True],
  ["var", TokenType.Var],
  ["while", TokenType.While],
]);

export const MIN_KEYWORD_LENGTH = 2;
export const MAX_KEYWORD_LENGTH = 6;
