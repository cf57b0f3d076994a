import { makeRange, type Component, type UrlSource } from '../types.js';
import { CHAR_USERINFO, isCharOfType } from './charTypes.js';
import { appendUtf8EscapedCodePoint } from './escape.js';
import type { CanonOutput } from './output.js';
import { readCodePoint } from './source.js';

const COLON = 0x3a;
const AT = 0x40;

export interface UserInfoResult {
  success: boolean;
  username: Component | undefined;
  password: Component | undefined;
}

/**
 * Appends `username[:password]@`. An empty password is dropped, and nothing at all is
 * written when both parts are empty. The two ranges may point into the same source as
 * long as they do not overlap.
 */
export function canonicalizeUserInfo(
  usernameSource: UrlSource,
  username: Component | undefined,
  passwordSource: UrlSource,
  password: Component | undefined,
  output: CanonOutput,
): UserInfoResult {
  const hasUsername = username !== undefined && username.length > 0;
  const hasPassword = password !== undefined && password.length > 0;

  if (!hasUsername && !hasPassword) {
    return { success: true, username: undefined, password: undefined };
  }

  let success = true;
  const usernameBegin = output.length;
  if (hasUsername) {
    success = appendUserInfoText(usernameSource, username, output) && success;
  }
  const outUsername = makeRange(usernameBegin, output.length);

  let outPassword: Component | undefined;
  if (hasPassword) {
    output.pushBack(COLON);
    const passwordBegin = output.length;
    success = appendUserInfoText(passwordSource, password, output) && success;
    outPassword = makeRange(passwordBegin, output.length);
  }

  output.pushBack(AT);
  return { success, username: outUsername, password: outPassword };
}

function appendUserInfoText(source: UrlSource, component: Component, output: CanonOutput): boolean {
  let success = true;
  const end = component.begin + component.length;
  for (let i = component.begin; i < end; ) {
    const { codePoint, next, valid } = readCodePoint(source, i, end);
    if (isCharOfType(codePoint, CHAR_USERINFO)) {
      output.pushBack(codePoint);
    } else {
      appendUtf8EscapedCodePoint(codePoint, output);
    }
    success = valid && success;
    i = next;
  }
  return success;
}
