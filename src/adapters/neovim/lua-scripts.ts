/**
 * Lua chunks executed server-side through `nvim_exec_lua`. Each operation is a
 * single chunk so it costs one round trip and never moves the user's cursor.
 * Arguments arrive as varargs (`...`); nothing is interpolated into source.
 */

const PRELUDE = `
local uv = vim.uv or vim.loop

local function canonical(name)
  return uv.fs_realpath(name) or vim.fn.fnamemodify(name, ":p")
end

local function find_buffer(path)
  for _, buf in ipairs(vim.api.nvim_list_bufs()) do
    local name = vim.api.nvim_buf_get_name(buf)
    if name ~= "" and canonical(name) == path then
      return buf
    end
  end
  return nil
end
`;

/** `...` = canonical path → `{ is_current, has_unsaved_changes }`. */
export const BUFFER_STATUS_LUA = `${PRELUDE}
local buf = find_buffer(...)
if buf == nil then
  return { is_current = false, has_unsaved_changes = false }
end
return {
  is_current = buf == vim.api.nvim_get_current_buf(),
  has_unsaved_changes = vim.bo[buf].modified,
}
`;

/**
 * `...` = canonical path → whether the buffer was open. Reloads it in place
 * and restores every window's view (cursor, topline, folds). A buffer with
 * unsaved changes is left alone.
 */
export const REFRESH_BUFFER_LUA = `${PRELUDE}
local buf = find_buffer(...)
if buf == nil then
  return false
end

local views = {}
for _, win in ipairs(vim.api.nvim_list_wins()) do
  if vim.api.nvim_win_get_buf(win) == buf then
    views[win] = vim.api.nvim_win_call(win, vim.fn.winsaveview)
  end
end

if not vim.bo[buf].modified then
  vim.api.nvim_buf_call(buf, function()
    vim.cmd("silent! edit")
  end)
end

for win, view in pairs(views) do
  if vim.api.nvim_win_is_valid(win) then
    vim.api.nvim_win_call(win, function()
      vim.fn.winrestview(view)
    end)
  end
end

if views[vim.api.nvim_get_current_win()] ~= nil then
  vim.cmd("redraw")
end
return true
`;

/** `...` = message. Scheduled so a hit-enter prompt cannot stall the RPC reply. */
export const SEND_MESSAGE_LUA = `
local message = ...
vim.schedule(function()
  vim.notify(message, vim.log.levels.WARN)
end)
return true
`;

/** No arguments → `{ file_path, start_line, end_line, content }` or nil outside visual mode. */
export const VISUAL_SELECTION_LUA = `${PRELUDE}
local mode = vim.api.nvim_get_mode().mode:sub(1, 1)
if mode ~= "v" and mode ~= "V" and mode ~= "\\22" then
  return nil
end

local buf = vim.api.nvim_get_current_buf()
local name = vim.api.nvim_buf_get_name(buf)
if name == "" then
  return nil
end

local from = vim.fn.getpos("v")
local to = vim.fn.getpos(".")
local start_row, start_col, end_row, end_col = from[2], from[3], to[2], to[3]
if start_row > end_row or (start_row == end_row and start_col > end_col) then
  start_row, start_col, end_row, end_col = end_row, end_col, start_row, start_col
end

-- Last byte of the character that starts at byte col.
local function char_end(line, col)
  return math.min(col - 1 + #vim.fn.strcharpart(line:sub(col), 0, 1), #line)
end

local lines
if mode == "V" then
  lines = vim.api.nvim_buf_get_lines(buf, start_row - 1, end_row, false)
elseif mode == "v" then
  local last = vim.api.nvim_buf_get_lines(buf, end_row - 1, end_row, false)[1] or ""
  lines = vim.api.nvim_buf_get_text(buf, start_row - 1, start_col - 1, end_row - 1, char_end(last, end_col), {})
else
  local left, right = math.min(start_col, end_col), math.max(start_col, end_col)
  lines = {}
  for _, line in ipairs(vim.api.nvim_buf_get_lines(buf, start_row - 1, end_row, false)) do
    table.insert(lines, line:sub(left, char_end(line, right)))
  end
end

local content = table.concat(lines, "\\n")
if content == "" then
  return nil
end
return {
  file_path = canonical(name),
  start_line = start_row,
  end_line = end_row,
  content = content,
}
`;
