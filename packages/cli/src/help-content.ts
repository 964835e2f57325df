/**
 * uis CLI help content.
 * Terse language reference for terminal output.
 */

export const QUICKREF = `
UISCRIPT QUICK REFERENCE (v0.1)
===============================

BLOCKS
  Hello #UI{ Canvas.show() } world      # block runs, text keeps "Hello  world"
  Blocks run in order, in one session; variables persist between them.

STATEMENTS
  var x = 1                              # declare (initializer optional)
  x = x + 1                              # assign
  Canvas.title = "demo"                  # set a host member
  if x > 1 then ... else if x then ... else ... end if
  while x < 10 do x = x + 1 end while
  return x                               # ends the block
  ;  optional everywhere      // line and /* block */ comments

VALUES
  number  string ("..." or '...')  true/false  null  handle

HELP TOPICS
  uis help syntax       statements, operators, precedence
  uis help values       types, truthiness, coercion
  uis help stdlib       built-in functions
  uis help objects      Canvas, Sound, SoundInstance
  uis help limits       resource limits and error codes
  uis help floor        any function, object or error code opens its topic
`.trimStart();

export const TOPICS: Record<string, string> = {
  syntax: `
SYNTAX
======

A block starts at the sentinel (default #UI{) and ends at its matching }.
Braces inside strings do not count. Keywords are case-insensitive;
identifiers are case-sensitive.

STATEMENTS
  var name [= expr]
  target = expr                 target is a name or obj.member
  if cond then ... [else if cond then ...]* [else ...] end if
  while cond do ... end while
  return [expr]
  expr                          usually a call: Canvas.clear("black")

  Parentheses around conditions are allowed, not required.
  A statement that fails to parse is reported and skipped; the rest of
  the block still runs.

OPERATORS (tightest first)
  not  -x                       unary
  *  /  %
  +  -                          + joins text when either side is text
  <  >  <=  >=
  ==  !=                        values of different types are never equal
  and  &&                       short-circuit, yields the deciding operand
  or   ||

CALLS
  floor(3.7)                    host function
  Canvas.drawLine("red", 0, 0, 10, 10)
  s.addNote(60, 0.5)            method on a handle held in a variable
`.trimStart(),

  values: `
VALUES
======

  number     64-bit float: 3, -2.5, 0.5
  string     "a\\tb", 'it''s'   escapes: \\n \\r \\t \\\\ \\" \\'
  boolean    true, false
  null
  handle     reference to a host object (Canvas, a SoundInstance)

TRUTHINESS
  false: null, false, 0, ""
  true:  everything else

COERCION
  Arithmetic and comparison read operands as numbers:
    true -> 1, false/null -> 0, numeric text -> its value, other text -> 0
  + concatenates when either side is a string or a handle.
  An unbound name evaluates to its own name as a string.
`.trimStart(),

  stdlib: `
STDLIB
======

CONTEXT
  hasInContext(name)      -> boolean   is the name bound?
  print(...values)        -> null      joins values with spaces
  typeof(x)               -> "number" | "string" | "boolean" | "null" | "handle"

CONVERSION
  toNumber(x)             -> number    0 when not numeric
  toString(x)             -> string

MATH
  floor(x)  ceil(x)  abs(x)
  round(x)                halves round to even: round(2.5) == 2
  min(a, b)  max(a, b)
  sin(x)  cos(x)          radians
  random()                -> [0, 1)
  randomRange(a, b)       -> [a, b)

Missing numeric arguments give 0.
`.trimStart(),

  objects: `
OBJECTS
=======

CANVAS
  Canvas.show()  Canvas.hide()  Canvas.render()  Canvas.setTitle(text)
  Canvas.setSize(w, h)             -> true, or false inside the 10s cooldown
  Canvas.clear([color])            default black
  Canvas.setPixel(color, x, y)
  Canvas.drawLine(color, x1, y1, x2, y2)
  Canvas.drawRect(color, x, y, w, h)     Canvas.fillRect(...)
  Canvas.drawCircle(color, x, y, r)      Canvas.fillCircle(...)
  Canvas.drawText(color, x, y, text[, size = 12])
  Getters: width height visible title      Setter: title

COLOURS
  "red", "navy", ...   "#f80"   "#ff8800"   "#ff880080"
  "255,128,0"  "1,0.5,0,0.5"   (0-1 when every component is at most 1)

SOUND
  var s = Sound.create("beep")     existing handle if taken, null at 100
  Sound.get(name)  Sound.destroy(name)  Sound.exists(name)
  s.addNote(pitch, duration[, velocity = 0.7])
      pitch 0-127, duration 0.001-10 s, velocity 0-1; 1000 notes max
  s.play()  s.stop()  s.clear()  s.setLoop(bool)
  Getters: isPlaying loop noteCount
`.trimStart(),

  limits: `
LIMITS
======

  maxVariables        100       script variables per session
  maxStringLength     102400    characters per string value
  maxIterations       40000     instructions per block
  maxExecutionMs      500       wall-clock time per block
  maxStackSize        1024      operand stack depth
  timeCheckInterval   1000      instructions between clock checks

Override in ./.uiscript.json or ~/.uiscript/config.json:
  { "version": 1, "enabled": true, "sentinel": "#UI{", "limits": { "maxIterations": 1000 } }

ERROR CODES
  E_LEX E_PARSE E_ASSIGN_TARGET E_COMPILE          block diagnostics (exit 2)
  E_ITERATION_LIMIT E_TIME_LIMIT E_STOPPED         run aborted
  E_STACK_OVERFLOW E_STACK_UNDERFLOW
  E_VARIABLE_LIMIT E_STRING_LIMIT E_DIV_ZERO E_NOT_CALLABLE
  E_UNKNOWN_FUNCTION E_UNKNOWN_METHOD E_UNKNOWN_MEMBER
  E_HOST E_HOST_ARGS E_INVALID_CHUNK E_RUNTIME     (exit 4)
  E_IO                                             file errors (exit 4)

A failed block keeps the variables it already set; later blocks still run.
`.trimStart(),
};

export const TOPIC_LIST = Object.keys(TOPICS);
